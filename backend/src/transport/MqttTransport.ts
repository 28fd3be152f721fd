import { EventEmitter } from 'node:events';
import { readFileSync } from 'node:fs';
import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { PositionTransport } from '../types/Telemetry';
import { createLogger } from '../utils/logger';

/**
 * MQTT subscriber for GNSS position messages
 * Re-emits every inbound message as ('message', topic, payload)
 */

export interface MqttTransportOptions {
  host: string;
  port?: number;
  username?: string;
  password?: string;
  tls?: boolean;
  /** Path to a CA bundle used to verify the broker when TLS is on */
  caCertPath?: string;
  clientId?: string;
  /** Keepalive in seconds (default: 60) */
  keepalive?: number;
  qos?: 0 | 1 | 2;
  /** Give up on the first connection after this many milliseconds (default: 30000) */
  connectTimeoutMs?: number;
  reconnectPeriodMs?: number;
}

export class MqttTransport extends EventEmitter implements PositionTransport {
  private readonly logger = createLogger({ component: 'MqttTransport' });
  private readonly options: MqttTransportOptions;
  private client: MqttClient | null = null;

  constructor(options: MqttTransportOptions) {
    super();
    this.options = options;
  }

  getBrokerUrl(): string {
    const protocol = this.options.tls ? 'mqtts' : 'mqtt';
    return `${protocol}://${this.options.host}:${this.options.port ?? 1883}`;
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Connect to the broker. Resolves on the first CONNACK, rejects if the
   * broker errors or stays silent before that.
   */
  connect(): Promise<void> {
    if (this.client) {
      return Promise.resolve();
    }

    const url = this.getBrokerUrl();
    const connectTimeoutMs = this.options.connectTimeoutMs ?? 30000;
    this.logger.info({ url }, 'Connecting to MQTT broker');

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let client: MqttClient;

      try {
        client = mqtt.connect(url, this.buildClientOptions());
      } catch (error) {
        reject(error);
        return;
      }
      this.client = client;

      const timer = setTimeout(() => {
        fail(new Error(`MQTT connection to ${url} timed out after ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.client = null;
        client.end(true);
        reject(error);
      };

      client.on('connect', () => {
        this.logger.info({ url }, 'MQTT connected successfully');
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve();
        }
      });

      client.on('error', (error) => {
        this.logger.error({ error: error.message }, 'MQTT connection error');
        fail(error);
      });

      client.on('offline', () => {
        this.logger.warn('MQTT client offline');
      });

      client.on('reconnect', () => {
        this.logger.info('MQTT reconnecting...');
      });

      client.on('message', (topic, payload) => {
        this.emit('message', topic, payload);
      });
    });
  }

  async subscribe(topic: string): Promise<void> {
    const client = this.requireClient();
    const qos = this.options.qos ?? 0;

    return new Promise<void>((resolve, reject) => {
      client.subscribe(topic, { qos }, (error) => {
        if (error) {
          this.logger.error({ topic, error: error.message }, 'MQTT subscription error');
          reject(error);
          return;
        }
        this.logger.info({ topic, qos }, 'Subscribed to topic');
        resolve();
      });
    });
  }

  unsubscribe(topic: string): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      client.unsubscribe(topic, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info({ topic }, 'Unsubscribed from topic');
        resolve();
      });
    });
  }

  disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.resolve();
    }
    this.client = null;

    return new Promise<void>((resolve) => {
      client.end(false, {}, () => {
        this.logger.info('MQTT disconnected');
        resolve();
      });
    });
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new Error('MQTT client is not connected');
    }
    return this.client;
  }

  private buildClientOptions(): IClientOptions {
    const { username, password, tls, caCertPath } = this.options;
    const clientOptions: IClientOptions = {
      clientId: this.options.clientId ?? `drill_relay_${Math.random().toString(16).slice(3)}`,
      keepalive: this.options.keepalive ?? 60,
      clean: true,
      reconnectPeriod: this.options.reconnectPeriodMs ?? 5000,
      connectTimeout: this.options.connectTimeoutMs ?? 30000,
    };

    if (username) {
      clientOptions.username = username;
      clientOptions.password = password;
    }

    if (tls) {
      clientOptions.rejectUnauthorized = true;
      if (caCertPath) {
        clientOptions.ca = readFileSync(caCertPath);
      }
    }

    return clientOptions;
  }
}
