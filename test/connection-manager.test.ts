import { describe, expect, it, vi } from 'vitest';
import { ConnectionManager } from '../src/connection-manager.js';
import {
  ConnectionError,
  ModbusError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from '../src/errors.js';
import { createMockLogger } from './helpers/mock-logger.js';
import { RecordingTransport } from './helpers/recording-transport.js';

describe('ConnectionManager', () => {
  it('moves from unconnected to connected', async () => {
    const transport = new RecordingTransport();
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());

    expect(manager.state).toBe('unconnected');
    const pending = manager.connect();
    expect(manager.state).toBe('connecting');
    await pending;

    expect(manager.state).toBe('connected');
    expect(manager.requireTransport()).toBe(transport);
  });

  it('wraps a connect failure in ConnectionError and releases the transport', async () => {
    const refused = new Error('ECONNREFUSED');
    const transport = new RecordingTransport({ connect: refused });
    const log = createMockLogger();
    const manager = new ConnectionManager(transport, '10.1.1.1', 100, log);

    const error = await manager.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: "Could not connect to '10.1.1.1'.",
      address: '10.1.1.1',
      cause: refused,
    });
    expect(manager.state).toBe('failed');
    expect(transport.closeCalls).toBe(1);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('gives up when the transport does not connect within the timeout', async () => {
    vi.useFakeTimers();
    try {
      const transport = new RecordingTransport({ connect: 'hang' });
      const manager = new ConnectionManager(transport, 'plc-a', 250, createMockLogger());

      const result = manager.connect().catch((err: unknown) => err);
      await vi.advanceTimersByTimeAsync(250);
      const error = await result;

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toHaveProperty('cause', expect.any(ModbusTimeoutError));
      expect(manager.state).toBe('failed');
    } finally {
      vi.useRealTimers();
    }
  });

  it('attempts the connection only once', async () => {
    const transport = new RecordingTransport();
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());
    await manager.connect();

    await expect(manager.connect()).rejects.toBeInstanceOf(ModbusError);
    expect(transport.connectCalls).toBe(1);
  });

  it('refuses to hand out the transport unless connected', async () => {
    const transport = new RecordingTransport();
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());

    expect(() => manager.requireTransport()).toThrow(ModbusNotConnectedError);
    await manager.connect();
    await manager.close();
    expect(() => manager.requireTransport()).toThrow("Transport for 'plc-a' is closed");
  });

  it('closes the transport once however many times close is called', async () => {
    const transport = new RecordingTransport();
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());
    await manager.connect();

    await Promise.all([manager.close(), manager.close()]);
    await manager.close();

    expect(manager.state).toBe('closed');
    expect(transport.closeCalls).toBe(1);
  });

  it('can be closed before connecting', async () => {
    const transport = new RecordingTransport();
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());

    await manager.close();
    await manager.close();
    await manager.connect();

    expect(manager.state).toBe('closed');
    expect(transport.closeCalls).toBe(1);
    expect(transport.connectCalls).toBe(0);
  });

  it('does not close the transport again after a failed connect', async () => {
    const transport = new RecordingTransport({ connect: new Error('EHOSTUNREACH') });
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());
    await manager.connect().catch(() => undefined);

    await manager.close();

    expect(transport.closeCalls).toBe(1);
    expect(manager.state).toBe('closed');
  });

  it('logs and absorbs a failing transport close', async () => {
    const transport = new RecordingTransport({ closeError: new Error('EPIPE') });
    const log = createMockLogger();
    const manager = new ConnectionManager(transport, 'plc-a', 100, log);
    await manager.connect();

    await expect(manager.close()).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith('Failed to close transport: EPIPE', {
      target: 'plc-a',
    });
  });

  it('stays closed when close wins against a pending connect', async () => {
    const transport = new RecordingTransport({ connect: 'deferred' });
    const manager = new ConnectionManager(transport, 'plc-a', 100, createMockLogger());

    const connecting = manager.connect();
    await manager.close();
    transport.resolveConnect();
    await connecting;

    expect(manager.state).toBe('closed');
    expect(() => manager.requireTransport()).toThrow(ModbusNotConnectedError);
  });
});
