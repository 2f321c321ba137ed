import type { MessageTransport, QoS } from '../types';

/**
 * Publishes relayed payloads to the downstream topic at QoS 1
 */
export class EgressPublisher {
  constructor(
    private readonly transport: MessageTransport,
    readonly topic: string,
    private readonly qos: QoS = 1
  ) {}

  /**
   * @throws DeliveryError when the transport refuses the publish
   */
  async publish(payload: string): Promise<void> {
    await this.transport.publish(this.topic, payload, this.qos);
    console.log(`[RELAY] Forwarded to ${this.topic}: ${payload}`);
  }
}
