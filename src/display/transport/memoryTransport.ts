import type { DisplayTransport } from '../displayTypes';

export type MemoryTransportOperation = 'open' | 'flush' | 'write' | 'close';

/**
 * Transport that keeps written frames in memory. Backs the hosts' dry-run
 * mode and the tests.
 */
export class MemoryTransport implements DisplayTransport {
  private readonly writes: Buffer[] = [];
  private readonly operations: MemoryTransportOperation[] = [];
  private readonly failures = new Map<MemoryTransportOperation, Error>();
  private opened = false;

  constructor(public readonly target = 'memory') {}

  public isOpen(): boolean {
    return this.opened;
  }

  public async open(): Promise<void> {
    this.record('open');
    this.opened = true;
  }

  public async flush(): Promise<void> {
    this.record('flush');
  }

  public async write(data: Uint8Array): Promise<void> {
    this.record('write');
    this.writes.push(Buffer.from(data));
  }

  public async close(): Promise<void> {
    this.record('close');
    this.opened = false;
  }

  /** Makes every later call of `operation` reject with `error`. */
  public failOn(operation: MemoryTransportOperation, error: Error = new Error(`${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  public clearFailures(): void {
    this.failures.clear();
  }

  public getOperations(): MemoryTransportOperation[] {
    return [...this.operations];
  }

  public getWrites(): string[] {
    return this.writes.map(buffer => buffer.toString('ascii'));
  }

  public getLastWrite(): string | undefined {
    return this.writes.at(-1)?.toString('ascii');
  }

  private record(operation: MemoryTransportOperation): void {
    this.operations.push(operation);
    const failure = this.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }
}
