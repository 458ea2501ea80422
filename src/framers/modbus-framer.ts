// src/framers/modbus-framer.ts

/**
 * Context for parsing a response (e.g. the transaction id the reply must echo)
 */
export interface FramerContext {
  transactionId?: number;
}

/**
 * Builds and parses application data units (ADU) around a PDU
 */
export interface ModbusFramer {
  /** Number of leading bytes needed before `getAduLength` can answer */
  readonly headerLength: number;

  /**
   * Wraps the PDU in the framing header
   */
  buildAdu(unitId: number, pdu: Uint8Array): Uint8Array;

  /**
   * Extracts the PDU from a complete ADU, validating the header
   */
  parseAdu(data: Uint8Array, context?: FramerContext): { unitId: number; pdu: Uint8Array };

  /**
   * Total ADU length announced by a received header
   */
  getAduLength(header: Uint8Array): number;

  /** Context the next response must match */
  readonly context: FramerContext;
}
