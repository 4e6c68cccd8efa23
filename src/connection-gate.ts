const STOPPED = 0;
const OPEN_CONNECTIONS = 1;

/**
 * Admission state shared by every request: a stopped flag that only ever
 * goes from 0 to 1 and a count of admitted requests still in flight. Both
 * cells are touched only through `Atomics`, so the buffer can be handed to
 * worker threads.
 */
export class ConnectionGate {
  private readonly cells: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(8)) {
    this.cells = new Int32Array(buffer, 0, 2);
  }

  get buffer(): SharedArrayBuffer {
    const { buffer } = this.cells;
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new TypeError('ConnectionGate is not backed by shared memory');
    }
    return buffer;
  }

  /**
   * Counts the request in before checking the flag, so a shutdown that
   * reads zero open connections never races a request slipping through.
   */
  admit(): boolean {
    Atomics.add(this.cells, OPEN_CONNECTIONS, 1);
    if (Atomics.load(this.cells, STOPPED) === 1) {
      Atomics.sub(this.cells, OPEN_CONNECTIONS, 1);
      return false;
    }
    return true;
  }

  release(): void {
    for (;;) {
      const current = Atomics.load(this.cells, OPEN_CONNECTIONS);
      if (current <= 0) {
        throw new RangeError('release() called without a matching admit()');
      }
      const previous = Atomics.compareExchange(
        this.cells,
        OPEN_CONNECTIONS,
        current,
        current - 1
      );
      if (previous === current) return;
    }
  }

  beginShutdown(): void {
    Atomics.compareExchange(this.cells, STOPPED, 0, 1);
  }

  isStopped(): boolean {
    return Atomics.load(this.cells, STOPPED) === 1;
  }

  openCount(): number {
    return Atomics.load(this.cells, OPEN_CONNECTIONS);
  }
}
