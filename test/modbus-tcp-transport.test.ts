import { describe, expect, it } from 'vitest';
import { ModbusClient } from '../src/client.js';
import { ModbusExceptionCode } from '../src/constants/constants.js';
import {
  ConnectionError,
  ModbusExceptionError,
  ModbusNotConnectedError,
  ModbusResponseError,
  ModbusTimeoutError,
  ModbusUnexpectedFunctionCodeError,
  RequestTimeoutError,
} from '../src/errors.js';
import SlaveEmulator from '../src/slave-emulator/slave-emulator.js';
import { ModbusTcpTransport } from '../src/transport/modbus-tcp-transport.js';
import type { ModbusClientOptions, Transport } from '../src/types/modbus-types.js';
import { buildMbapHeader, parseMbapHeader } from '../src/utils/tcp-utils.js';

/** Byte transport answering each request with the next scripted PDU */
class ScriptedTransport implements Transport {
  public isOpen = false;
  private pending = new Uint8Array(0);

  constructor(private readonly responses: Uint8Array[]) {}

  async connect(): Promise<void> {
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
  }

  async write(buffer: Uint8Array): Promise<void> {
    const { transactionId, unitId } = parseMbapHeader(buffer);
    const pdu = this.responses.shift() ?? new Uint8Array(0);
    const response = new Uint8Array(7 + pdu.length);
    response.set(buildMbapHeader(transactionId, unitId, pdu.length));
    response.set(pdu, 7);
    this.pending = response;
  }

  async read(length: number): Promise<Uint8Array> {
    const data = this.pending.slice(0, length);
    this.pending = this.pending.slice(length);
    return data;
  }
}

async function connected(emulator: Transport, unitId = 1, timeout = 100) {
  const transport = new ModbusTcpTransport(emulator, { unitId, timeout });
  await transport.connect();
  return transport;
}

function emulatorClient(emulator: SlaveEmulator, options: ModbusClientOptions = {}) {
  return new ModbusClient('emulated-plc', {
    ...options,
    transport: (_target, resolved) =>
      new ModbusTcpTransport(emulator, { unitId: resolved.unitId, timeout: resolved.timeout }),
  });
}

describe('ModbusTcpTransport', () => {
  it('reads holding registers from the device', async () => {
    const emulator = new SlaveEmulator();
    emulator.setHoldingRegisters(100, [1, 0xbeef, 65535]);
    const transport = await connected(emulator);

    expect(await transport.readHoldingRegisters(100, 3)).toEqual([1, 0xbeef, 65535]);
    expect(emulator.requests).toEqual([{ functionCode: 0x03, address: 100, quantity: 3 }]);
  });

  it('writes holding registers to the device', async () => {
    const emulator = new SlaveEmulator();
    const transport = await connected(emulator);

    await transport.writeRegisters(10, [7, 8]);

    expect(emulator.getHoldingRegister(10)).toBe(7);
    expect(emulator.getHoldingRegister(11)).toBe(8);
  });

  it('waits for a delayed response', async () => {
    const emulator = new SlaveEmulator({ responseDelay: 5 });
    emulator.setHoldingRegister(0, 42);
    const transport = await connected(emulator);

    expect(await transport.readHoldingRegisters(0, 1)).toEqual([42]);
  });

  it('raises exception responses as ModbusExceptionError', async () => {
    const emulator = new SlaveEmulator();
    emulator.setException(0x03, 5, ModbusExceptionCode.SLAVE_DEVICE_BUSY);
    const transport = await connected(emulator);

    await expect(transport.readHoldingRegisters(0, 10)).rejects.toMatchObject({
      name: 'ModbusExceptionError',
      functionCode: 0x03,
      exceptionCode: ModbusExceptionCode.SLAVE_DEVICE_BUSY,
    });
    await expect(transport.readHoldingRegisters(0xfff0, 32)).rejects.toMatchObject({
      exceptionCode: ModbusExceptionCode.ILLEGAL_DATA_ADDRESS,
    });
  });

  it('times out when the device does not answer', async () => {
    const emulator = new SlaveEmulator({ unitId: 1 });
    const transport = await connected(emulator, 2, 30);

    await expect(transport.readHoldingRegisters(0, 1)).rejects.toBeInstanceOf(ModbusTimeoutError);
  });

  it('refuses to exchange after close and closes once', async () => {
    const emulator = new SlaveEmulator();
    const transport = await connected(emulator);

    await transport.close();
    await transport.close();

    expect(emulator.isOpen).toBe(false);
    await expect(transport.readHoldingRegisters(0, 1)).rejects.toBeInstanceOf(
      ModbusNotConnectedError
    );
  });

  it('rejects a response with the wrong number of registers', async () => {
    const transport = await connected(new ScriptedTransport([Uint8Array.of(0x03, 0x02, 0, 1)]));

    await expect(transport.readHoldingRegisters(0, 2)).rejects.toThrow(
      new ModbusResponseError('Expected 2 registers from address 0, got 1')
    );
  });

  it('rejects a write echo that does not match the request', async () => {
    const transport = await connected(
      new ScriptedTransport([Uint8Array.of(0x10, 0x00, 0x05, 0x00, 0x01)])
    );

    await expect(transport.writeRegisters(4, [1])).rejects.toThrow(
      'Write echo mismatch: sent 4+1, got 5+1'
    );
  });

  it('rejects a response for another function', async () => {
    const transport = await connected(new ScriptedTransport([Uint8Array.of(0x04, 0x02, 0, 1)]));

    await expect(transport.readHoldingRegisters(0, 1)).rejects.toBeInstanceOf(
      ModbusUnexpectedFunctionCodeError
    );
  });
});

describe('SlaveEmulator', () => {
  it('drops a request written while the previous one is being processed', async () => {
    const emulator = new SlaveEmulator({ responseDelay: 20 });
    await emulator.connect();
    const request = Uint8Array.of(0, 1, 0, 0, 0, 6, 1, 0x03, 0, 0, 0, 1);

    await emulator.write(request);
    await emulator.write(request);

    expect(emulator.overlaps).toBe(1);
    expect(emulator.requests).toHaveLength(1);
    await emulator.disconnect();
  });

  it('answers an unknown function with ILLEGAL_FUNCTION', () => {
    const emulator = new SlaveEmulator();

    const response = emulator.handleRequest(Uint8Array.of(0, 9, 0, 0, 0, 2, 1, 0x2b));

    expect(response).toEqual(Uint8Array.of(0, 9, 0, 0, 0, 3, 1, 0xab, 0x01));
  });

  it('answers normally again once exceptions are cleared', async () => {
    const emulator = new SlaveEmulator();
    emulator.setHoldingRegister(3, 99);
    emulator.setException(0x03, 3, ModbusExceptionCode.SLAVE_DEVICE_FAILURE);
    const transport = await connected(emulator);

    await expect(transport.readHoldingRegisters(3, 1)).rejects.toBeInstanceOf(
      ModbusExceptionError
    );
    emulator.clearExceptions();

    expect(await transport.readHoldingRegisters(3, 1)).toEqual([99]);
  });

  it('fails connect when configured to', async () => {
    const emulator = new SlaveEmulator({ connectError: new Error('ECONNREFUSED') });

    await expect(emulator.connect()).rejects.toThrow('ECONNREFUSED');
    expect(emulator.isOpen).toBe(false);
  });
});

describe('ModbusClient over the emulated device', () => {
  it('reads 300 registers in three requests', async () => {
    const emulator = new SlaveEmulator();
    const values = Array.from({ length: 300 }, (_, i) => (i * 31) & 0xffff);
    emulator.setHoldingRegisters(0, values);
    const client = emulatorClient(emulator);

    expect(await client.readRegisters(0, 300)).toEqual(values);
    expect(emulator.requests.map(r => [r.address, r.quantity])).toEqual([
      [0, 124],
      [124, 124],
      [248, 52],
    ]);
    await client.close();
  });

  it('never overlaps requests on a slow half-duplex device', async () => {
    const emulator = new SlaveEmulator({ responseDelay: 2 });
    const client = emulatorClient(emulator);

    await Promise.all([
      client.readRegisters(0, 200),
      client.writeRegisters(500, [1, 2, 3]),
      client.readRegisters(1000, 10),
      client.writeRegisters(600, [4]),
    ]);

    expect(emulator.overlaps).toBe(0);
    expect(emulator.requests).toHaveLength(2 + 1 + 1 + 1);
    expect(emulator.getHoldingRegister(502)).toBe(3);
    await client.close();
  });

  it('passes range and protocol errors through unchanged', async () => {
    const emulator = new SlaveEmulator();
    emulator.setException(0x10, 7, ModbusExceptionCode.ILLEGAL_DATA_VALUE);
    const client = emulatorClient(emulator);

    await expect(client.writeRegisters(0, new Array<number>(124).fill(0))).rejects.toThrow(
      RangeError
    );
    await expect(client.writeRegisters(7, [1])).rejects.toBeInstanceOf(ModbusExceptionError);
    await client.close();
  });

  it('reports an unanswered request as RequestTimeoutError', async () => {
    const emulator = new SlaveEmulator({ unitId: 9 });
    const client = emulatorClient(emulator, { unitId: 1, timeout: 30 });

    const error = await client.readRegisters(0, 1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toHaveProperty('message', "Request to 'emulated-plc' timed out.");
    await client.close();
  });

  it('reports a refused connection as ConnectionError', async () => {
    const refused = new Error('ECONNREFUSED');
    const client = emulatorClient(new SlaveEmulator({ connectError: refused }));

    await expect(client.readRegisters(0, 1)).rejects.toMatchObject({
      name: 'ConnectionError',
      cause: refused,
    });
    await expect(client.ready()).rejects.toBeInstanceOf(ConnectionError);
    await client.close();
  });
});
