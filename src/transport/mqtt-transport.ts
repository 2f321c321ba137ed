/**
 * MQTT transport
 *
 * Two client connections, as the deployed relays use: one consumes the
 * ingress topic, the other publishes downstream. Incoming messages are
 * buffered in a bounded inbox that the poll loop drains with tryReceive();
 * when the inbox is full the newest message is dropped and logged.
 *
 * mqtt.js reconnects on its own; while the publisher is offline publish()
 * rejects immediately with DeliveryError, which the breaker counts as a
 * failed delivery.
 */

import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { BoundedQueue } from '../core/bounded-queue';
import { DeliveryError, errorMessage } from '../errors';
import type { InboundMessage, MessageTransport, QoS } from '../types';

export interface MqttTransportOptions {
  brokerUrl: string;
  clientId: string;
  inboxCapacity: number;
  connectTimeoutMs?: number;
  /** Fired on connect/offline of either client. Runs on the mqtt.js event loop turn. */
  onConnectionChange?: (connected: boolean) => void;
}

export class MqttTransport implements MessageTransport {
  private consumer?: MqttClient;
  private publisher?: MqttClient;
  private readonly inbox: BoundedQueue<InboundMessage>;

  constructor(private readonly options: MqttTransportOptions) {
    this.inbox = new BoundedQueue<InboundMessage>({
      capacity: options.inboxCapacity,
      overflowPolicy: 'drop-newest',
      onDrop: (item) => console.warn(`[MQTT] Inbox full, dropping message on ${item.data.topic}`),
    });
  }

  async connect(): Promise<void> {
    // A retried connect must not leave a half-open pair behind
    if (this.consumer || this.publisher) {
      await this.disconnect();
    }

    const base: IClientOptions = {
      connectTimeout: this.options.connectTimeoutMs ?? 10_000,
      reconnectPeriod: 1_000,
      clean: true,
    };

    this.consumer = await this.open({ ...base, clientId: this.options.clientId });
    this.publisher = await this.open({ ...base, clientId: `${this.options.clientId}_sender` });

    this.consumer.on('message', (topic: string, payload: Buffer) => {
      this.inbox.enqueue({ topic, payload: payload.toString('utf8'), receivedAt: Date.now() });
    });

    console.log(`[MQTT] Connected to ${this.options.brokerUrl} as ${this.options.clientId}`);
  }

  async subscribe(topic: string): Promise<void> {
    const consumer = this.consumer;
    if (!consumer) {
      throw new Error(`Cannot subscribe to ${topic}: not connected`);
    }

    await new Promise<void>((resolve, reject) => {
      consumer.subscribe(topic, { qos: 1 }, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    console.log(`[MQTT] Subscribed to topic: ${topic}`);
  }

  tryReceive(): InboundMessage | null {
    return this.inbox.dequeue()?.data ?? null;
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    const publisher = this.publisher;
    if (!publisher || !publisher.connected) {
      throw new DeliveryError(topic, 'Publish failed: broker connection is down');
    }

    await new Promise<void>((resolve, reject) => {
      publisher.publish(topic, payload, { qos }, (error) => {
        if (error) {
          reject(new DeliveryError(topic, `Publish refused: ${errorMessage(error)}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  async disconnect(): Promise<void> {
    await Promise.all([this.close(this.consumer), this.close(this.publisher)]);
    this.consumer = undefined;
    this.publisher = undefined;
    console.log('[MQTT] Disconnected');
  }

  isConnected(): boolean {
    return Boolean(this.consumer?.connected && this.publisher?.connected);
  }

  /**
   * Resolves on the first CONNACK. A client that neither connects nor errors
   * within connectTimeout is ended, so it cannot keep reconnecting under the
   * same client id as a later attempt.
   */
  private open(clientOptions: IClientOptions): Promise<MqttClient> {
    const deadlineMs = clientOptions.connectTimeout ?? 10_000;

    return new Promise<MqttClient>((resolve, reject) => {
      const client = connect(this.options.brokerUrl, clientOptions);

      const abandon = (error: Error) => {
        clearTimeout(deadline);
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.end(true);
        reject(error);
      };
      const onError = (error: Error) => abandon(error);
      const onConnect = () => {
        clearTimeout(deadline);
        client.removeListener('error', onError);
        this.watch(client, clientOptions.clientId ?? 'unknown');
        resolve(client);
      };
      const deadline = setTimeout(() => {
        abandon(new Error(`No CONNACK from ${this.options.brokerUrl} within ${deadlineMs}ms`));
      }, deadlineMs);

      client.once('connect', onConnect);
      client.once('error', onError);
    });
  }

  private watch(client: MqttClient, clientId: string): void {
    client.on('offline', () => {
      console.warn(`[MQTT] ${clientId} offline, reconnecting...`);
      this.options.onConnectionChange?.(false);
    });
    client.on('connect', () => {
      this.options.onConnectionChange?.(true);
    });
    client.on('error', (error) => {
      console.error(`[MQTT] ${clientId} error:`, errorMessage(error));
    });
  }

  private close(client: MqttClient | undefined): Promise<void> {
    if (!client) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      client.end(false, {}, () => resolve());
    });
  }
}
