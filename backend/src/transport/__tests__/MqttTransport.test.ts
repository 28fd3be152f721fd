import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MqttTransport } from '../MqttTransport';

const { connectMock } = vi.hoisted(() => ({ connectMock: vi.fn() }));

vi.mock('mqtt', () => ({
  default: { connect: connectMock },
}));

// Minimal stand-in for an MqttClient
class FakeMqttClient extends EventEmitter {
  connected = true;
  subscribe = vi.fn((_topic: string, _options: { qos: number }, callback: (error: Error | null) => void) => {
    callback(null);
  });
  unsubscribe = vi.fn((_topic: string, callback: (error?: Error) => void) => {
    callback();
  });
  end = vi.fn((_force?: boolean, _options?: object, callback?: () => void) => {
    this.connected = false;
    callback?.();
  });
}

describe('MqttTransport', () => {
  let client: FakeMqttClient;
  let transport: MqttTransport;

  beforeEach(() => {
    client = new FakeMqttClient();
    connectMock.mockReturnValue(client);
    transport = new MqttTransport({
      host: 'broker.local',
      username: 'rig-user',
      password: 'test-secret',
      clientId: 'rig-relay',
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  async function connected(): Promise<void> {
    const pending = transport.connect();
    client.emit('connect');
    await pending;
  }

  describe('getBrokerUrl', () => {
    it('should default to plain MQTT on 1883', () => {
      expect(transport.getBrokerUrl()).toBe('mqtt://broker.local:1883');
    });

    it('should switch protocol for TLS', () => {
      const secure = new MqttTransport({ host: 'broker.local', port: 8883, tls: true });
      expect(secure.getBrokerUrl()).toBe('mqtts://broker.local:8883');
    });
  });

  describe('connect', () => {
    it('should resolve once the broker acknowledges', async () => {
      await connected();

      expect(connectMock).toHaveBeenCalledWith('mqtt://broker.local:1883', expect.objectContaining({
        clientId: 'rig-relay',
        keepalive: 60,
        clean: true,
        reconnectPeriod: 5000,
        username: 'rig-user',
        password: 'test-secret',
      }));
      expect(transport.isConnected()).toBe(true);
    });

    it('should verify the broker certificate when TLS is on', async () => {
      const secure = new MqttTransport({ host: 'broker.local', port: 8883, tls: true });

      const pending = secure.connect();
      client.emit('connect');
      await pending;

      expect(connectMock).toHaveBeenCalledWith('mqtts://broker.local:8883', expect.objectContaining({
        rejectUnauthorized: true,
      }));
    });

    it('should reject and close the client on a connection error', async () => {
      const pending = transport.connect();
      client.emit('error', new Error('Connection refused: Not authorized'));

      await expect(pending).rejects.toThrow('Not authorized');
      expect(client.end).toHaveBeenCalledWith(true);
      expect(transport.isConnected()).toBe(false);
    });

    it('should reject when the broker stays silent', async () => {
      vi.useFakeTimers();
      const silent = new MqttTransport({ host: 'broker.local', connectTimeoutMs: 1000 });

      const result = expect(silent.connect()).rejects.toThrow('timed out after 1000ms');
      await vi.advanceTimersByTimeAsync(1000);

      await result;
      expect(client.end).toHaveBeenCalledWith(true);
    });

    it('should not open a second client', async () => {
      await connected();
      await transport.connect();

      expect(connectMock).toHaveBeenCalledOnce();
    });
  });

  describe('messages', () => {
    it('should re-emit inbound messages', async () => {
      const received: Array<[string, string]> = [];
      transport.on('message', (topic: string, payload: Buffer) => {
        received.push([topic, payload.toString()]);
      });
      await connected();

      client.emit('message', 'device/rig-1/upload', Buffer.from('{"lat":1,"lon":2}'));

      expect(received).toEqual([['device/rig-1/upload', '{"lat":1,"lon":2}']]);
    });
  });

  describe('subscribe', () => {
    it('should subscribe with the configured QoS', async () => {
      await connected();

      await transport.subscribe('device/+/upload');

      expect(client.subscribe).toHaveBeenCalledWith('device/+/upload', { qos: 0 }, expect.any(Function));
    });

    it('should reject when the broker refuses the subscription', async () => {
      client.subscribe.mockImplementationOnce((_topic, _options, callback) => {
        callback(new Error('Subscription refused'));
      });
      await connected();

      await expect(transport.subscribe('device/+/upload')).rejects.toThrow('Subscription refused');
    });

    it('should reject before a connection exists', async () => {
      await expect(transport.subscribe('device/+/upload')).rejects.toThrow('MQTT client is not connected');
    });
  });

  describe('unsubscribe and disconnect', () => {
    it('should unsubscribe and end the client gracefully', async () => {
      await connected();

      await transport.unsubscribe('device/+/upload');
      await transport.disconnect();

      expect(client.unsubscribe).toHaveBeenCalledWith('device/+/upload', expect.any(Function));
      expect(client.end).toHaveBeenCalledWith(false, {}, expect.any(Function));
      expect(transport.isConnected()).toBe(false);
    });

    it('should do nothing without a connection', async () => {
      await expect(transport.unsubscribe('device/+/upload')).resolves.toBeUndefined();
      await expect(transport.disconnect()).resolves.toBeUndefined();
      expect(client.end).not.toHaveBeenCalled();
    });
  });
});
