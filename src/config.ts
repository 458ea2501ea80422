// src/config.ts

import {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_UNIT_ID,
  MODBUS_TCP_DEFAULT_PORT,
} from './constants/constants.js';
import { ModbusConfigError, ModbusInvalidAddressError } from './errors.js';
import { LogLevel, ModbusClientOptions, ResolvedClientOptions } from './types/modbus-types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Applies defaults to client options and validates them.
 * @throws ModbusConfigError If an option is out of range
 * @throws ModbusInvalidAddressError If the unit id is not 0-255
 */
export function resolveClientOptions(options: ModbusClientOptions = {}): ResolvedClientOptions {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const unitId = options.unitId ?? DEFAULT_UNIT_ID;
  const port = options.port ?? MODBUS_TCP_DEFAULT_PORT;
  const logLevel = options.logLevel;

  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ModbusConfigError(
      `Timeout must be a positive number of milliseconds, got ${timeout}`
    );
  }
  if (!Number.isInteger(unitId) || unitId < 0 || unitId > 255) {
    throw new ModbusInvalidAddressError(unitId);
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ModbusConfigError(`Port must be an integer between 1-65535, got ${port}`);
  }
  if (logLevel !== undefined && !LOG_LEVELS.includes(logLevel)) {
    throw new ModbusConfigError(`Unknown log level: ${logLevel}`);
  }

  const resolved: ResolvedClientOptions = { timeout, unitId, port };
  if (logLevel !== undefined) resolved.logLevel = logLevel;
  return resolved;
}
