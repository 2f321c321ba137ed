/**
 * In-process publish/subscribe broker
 *
 * Same contract as MqttTransport, minus the network: used by the test suite
 * and by RELAY_SIMULATE=true runs. Several InMemoryTransport clients attached
 * to one InMemoryBroker see each other's publishes, which is how a simulated
 * cluster shares the ingress topic. Topics match exactly (no wildcards).
 */

import { BoundedQueue } from '../core/bounded-queue';
import { DeliveryError } from '../errors';
import type { InboundMessage, MessageTransport, QoS } from '../types';

export interface PublishedMessage {
  topic: string;
  payload: string;
  qos: QoS;
  publishedAt: number;
}

export class InMemoryBroker {
  private readonly clients = new Set<InMemoryTransport>();
  private readonly log: PublishedMessage[] = [];

  attach(client: InMemoryTransport): void {
    this.clients.add(client);
  }

  detach(client: InMemoryTransport): void {
    this.clients.delete(client);
  }

  route(message: PublishedMessage): void {
    this.log.push(message);
    for (const client of this.clients) {
      client.deliver(message);
    }
  }

  /**
   * Payloads published on a topic so far, oldest first
   */
  published(topic: string): string[] {
    return this.log.filter((message) => message.topic === topic).map((message) => message.payload);
  }

  /**
   * Publish as an outside party (a sensor, a test)
   */
  inject(topic: string, payload: string): void {
    this.route({ topic, payload, qos: 1, publishedAt: Date.now() });
  }
}

export class InMemoryTransport implements MessageTransport {
  private readonly subscriptions = new Set<string>();
  private readonly inbox: BoundedQueue<InboundMessage>;
  private connected = false;
  private refusePublishes = false;

  constructor(
    private readonly broker: InMemoryBroker = new InMemoryBroker(),
    inboxCapacity: number = 0
  ) {
    this.inbox = new BoundedQueue<InboundMessage>({
      capacity: inboxCapacity,
      overflowPolicy: 'drop-newest',
      onDrop: (item) => console.warn(`[MEMORY] Inbox full, dropping message on ${item.data.topic}`),
    });
  }

  getBroker(): InMemoryBroker {
    return this.broker;
  }

  async connect(): Promise<void> {
    this.broker.attach(this);
    this.connected = true;
  }

  async subscribe(topic: string): Promise<void> {
    if (!this.connected) {
      throw new Error(`Cannot subscribe to ${topic}: not connected`);
    }
    this.subscriptions.add(topic);
  }

  tryReceive(): InboundMessage | null {
    return this.inbox.dequeue()?.data ?? null;
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    if (!this.connected) {
      throw new DeliveryError(topic, 'Publish failed: not connected');
    }
    if (this.refusePublishes) {
      throw new DeliveryError(topic, 'Publish refused by broker');
    }
    this.broker.route({ topic, payload, qos, publishedAt: Date.now() });
  }

  async disconnect(): Promise<void> {
    this.broker.detach(this);
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Make every publish reject with DeliveryError until switched back
   */
  setRefusePublishes(refuse: boolean): void {
    this.refusePublishes = refuse;
  }

  /** Called by the broker for every routed message */
  deliver(message: PublishedMessage): void {
    if (!this.subscriptions.has(message.topic)) {
      return;
    }
    this.inbox.enqueue({ topic: message.topic, payload: message.payload, receivedAt: Date.now() });
  }

  pendingInbound(): number {
    return this.inbox.size();
  }
}
