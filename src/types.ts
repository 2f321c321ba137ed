/**
 * Core types for the Fault-Tolerant Relay service
 */

/**
 * Sensor reading as the simulator publishes it on the ingress topic
 */
export interface SensorPayload {
  device_id: string;
  temperature: number;
  [key: string]: unknown;
}

/**
 * Payload after the transformation stage has enriched it. Ingress fields are
 * carried over as received; only their presence is checked upstream.
 */
export interface ProcessedPayload {
  [key: string]: unknown;
  processed: true;
  server_timestamp: number; // epoch seconds
}

/**
 * A message taken off the ingress topic
 */
export interface InboundMessage {
  topic: string;
  payload: string;
  receivedAt: number;
}

/**
 * MQTT delivery guarantee. Egress always publishes at 1 (at-least-once).
 */
export type QoS = 0 | 1 | 2;

/**
 * Publish/subscribe transport the relay reads from and writes to.
 *
 * tryReceive() never blocks: it returns the oldest buffered message or null.
 * publish() rejects with a DeliveryError when the broker is unreachable or
 * refuses the message.
 */
export interface MessageTransport {
  connect(): Promise<void>;
  subscribe(topic: string): Promise<void>;
  tryReceive(): InboundMessage | null;
  publish(topic: string, payload: string, qos: QoS): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
}

/**
 * The three ways a node can wrap the relay
 */
export type StrategyName = 'breaker' | 'pipeline' | 'cluster';

/**
 * One relay strategy: handles a single inbound payload and runs the
 * periodic maintenance that belongs to it (retry drain, health sweep,
 * leader heuristic).
 */
export interface RelayStrategy {
  readonly name: StrategyName;
  handle(payload: string): Promise<RelayOutcome>;
  maintain(now: number): Promise<void>;
  snapshot(): Record<string, unknown>;
}

/**
 * What happened to one inbound payload
 */
export type RelayOutcome =
  | { status: 'forwarded' }
  | { status: 'buffered'; reason: string }
  | { status: 'dropped'; reason: string }
  | { status: 'routed'; to: string };

/**
 * Counters exposed on the status endpoint
 */
export interface RelayStats {
  cycles: number;
  received: number;
  forwarded: number;
  buffered: number;
  dropped: number;
  routed: number;
  failed: number;
}
