/**
 * Fault-Tolerant Relay - HTTP status server
 *
 * Read-only view of a running relay node:
 * - GET /health  liveness
 * - GET /status  strategy state (breaker, retry buffer, pipeline, cluster role) and counters
 */

import express, { Request, Response } from 'express';
import type { Server } from 'http';
import type { RelayNode } from './relay/relay-node';

export function createStatusApp(node: RelayNode): express.Express {
  const app = express();

  /**
   * GET /health
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: node.isRunning() ? 'healthy' : 'stopped',
      nodeId: node.nodeId,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /status
   */
  app.get('/status', (_req: Request, res: Response) => {
    res.status(200).json({
      ...node.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

/**
 * Listen on the given port; resolves once the socket is bound
 */
export function startStatusServer(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`[SERVER] Status server listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
