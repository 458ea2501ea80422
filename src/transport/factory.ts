// src/transport/factory.ts

import NodeTcpTransport from './node-transports/node-tcp-transport.js';
import { ModbusTcpTransport } from './modbus-tcp-transport.js';
import type {
  RegisterTransport,
  ResolvedClientOptions,
  TcpTarget,
} from '../types/modbus-types.js';

/**
 * Default transport factory: Modbus TCP over a Node.js socket.
 *
 * @param target - Host and port of the device
 * @param options - Resolved client options; `timeout` becomes the response timeout
 */
export function createTcpRegisterTransport(
  target: TcpTarget,
  options: ResolvedClientOptions
): RegisterTransport {
  const socket = new NodeTcpTransport(target.host, target.port, { readTimeout: options.timeout });
  return new ModbusTcpTransport(socket, { unitId: options.unitId, timeout: options.timeout });
}
