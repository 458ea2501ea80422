import type { RegisterTransport } from '../../src/types/modbus-types.js';

export type ConnectBehaviour = 'resolve' | 'hang' | 'deferred' | Error;

export interface RecordedRequest {
  method: 'readHoldingRegisters' | 'writeRegisters';
  address: number;
  count: number;
  startedAt: number;
  finishedAt: number | null;
}

export interface RecordingTransportOptions {
  connect?: ConnectBehaviour;
  /** Per-request latency in ms; without it a request yields once to the microtask queue */
  latency?: number;
  closeError?: Error;
}

/** Deterministic register contents: value at `address` */
export function registerValue(address: number): number {
  return (address * 7 + 3) & 0xffff;
}

export function expectedRegisters(address: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => registerValue(address + i));
}

/**
 * Register transport stand-in that records every request on a logical clock
 * and tracks how many exchanges are in flight at once.
 */
export class RecordingTransport implements RegisterTransport {
  public readonly requests: RecordedRequest[] = [];
  public readonly written = new Map<number, number>();
  public connectCalls = 0;
  public closeCalls = 0;
  public active = 0;
  public maxActive = 0;

  private readonly failures = new Map<number, unknown>();
  private tick = 0;
  private settleConnect: { resolve: () => void; reject: (err: Error) => void } | null = null;

  constructor(private readonly options: RecordingTransportOptions = {}) {}

  /** Makes the next request fail with `error` */
  failNext(error: unknown): void {
    this.failRequest(this.requests.length, error);
  }

  /** Makes the request at position `index` (0-based, in arrival order) fail with `error` */
  failRequest(index: number, error: unknown): void {
    this.failures.set(index, error);
  }

  resolveConnect(): void {
    this.settleConnect?.resolve();
  }

  rejectConnect(err: Error): void {
    this.settleConnect?.reject(err);
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    const behaviour = this.options.connect ?? 'resolve';
    if (behaviour instanceof Error) throw behaviour;
    if (behaviour === 'hang') return new Promise<void>(() => undefined);
    if (behaviour === 'deferred') {
      return new Promise<void>((resolve, reject) => {
        this.settleConnect = { resolve, reject };
      });
    }
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.options.closeError) throw this.options.closeError;
  }

  readHoldingRegisters(address: number, count: number): Promise<number[]> {
    return this.exchange('readHoldingRegisters', address, count, () =>
      Array.from(
        { length: count },
        (_, i) => this.written.get(address + i) ?? registerValue(address + i)
      )
    );
  }

  writeRegisters(address: number, values: readonly number[]): Promise<void> {
    return this.exchange('writeRegisters', address, values.length, () => {
      values.forEach((value, i) => this.written.set(address + i, value));
    });
  }

  private async exchange<T>(
    method: RecordedRequest['method'],
    address: number,
    count: number,
    produce: () => T
  ): Promise<T> {
    const entry: RecordedRequest = {
      method,
      address,
      count,
      startedAt: this.tick++,
      finishedAt: null,
    };
    const index = this.requests.push(entry) - 1;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.options.latency === undefined) {
        await Promise.resolve();
      } else {
        await new Promise(resolve => setTimeout(resolve, this.options.latency));
      }
      if (this.failures.has(index)) throw this.failures.get(index);
      return produce();
    } finally {
      this.active--;
      entry.finishedAt = this.tick++;
    }
  }
}

/** True when no recorded request started before the previous one finished */
export function isStrictlySequential(requests: readonly RecordedRequest[]): boolean {
  return requests.every((request, i) => {
    const previous = requests[i - 1];
    if (previous === undefined) return true;
    return previous.finishedAt !== null && request.startedAt > previous.finishedAt;
  });
}
