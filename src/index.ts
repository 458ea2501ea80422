// src/index.ts

export { ModbusClient, withModbusClient } from './client.js';
export { resolveClientOptions } from './config.js';
export { ConnectionManager } from './connection-manager.js';
export { RequestSerializer } from './request-serializer.js';
export { RegisterChunker, planRegisterChunks } from './register-chunker.js';
export { translateRequestError, isRequestTimeoutCause } from './error-translator.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/modbus-types.js';
export { default as Logger, logger } from './logger.js';
export { ModbusTcpTransport } from './transport/modbus-tcp-transport.js';
export type { ModbusTcpTransportOptions } from './transport/modbus-tcp-transport.js';
export { createTcpRegisterTransport } from './transport/factory.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export type { NodeTcpTransportOptions } from './transport/node-transports/node-tcp-transport.js';
export { TcpFramer } from './framers/tcp-framer.js';
export { ModbusProtocol } from './framers/modbus-protocol.js';
export type { ModbusFramer, FramerContext } from './framers/modbus-framer.js';
export { default as SlaveEmulator } from './slave-emulator/slave-emulator.js';
export type { EmulatorRequest } from './slave-emulator/slave-emulator.js';
export { parseTcpAddress } from './utils/tcp-utils.js';
