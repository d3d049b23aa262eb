/**
 * Modelsync Transfer - Relay Buffer
 * Bounded byte queue joining a producer (download) to a consumer (upload)
 */

export interface RelayBufferOptions {
  /** Aborting fails every pending and future read/write with the signal's reason */
  signal?: AbortSignal;
}

export interface RelayBufferStats {
  buffered: number;
  bytesWritten: number;
  bytesRead: number;
  /** Highest buffered byte count observed */
  peak: number;
}

type Waiter = () => void;

export class RelayBufferClosedError extends Error {
  constructor() {
    super('Relay buffer is closed');
    this.name = 'RelayBufferClosedError';
  }
}

/**
 * write() suspends while the buffer is full; read() suspends while it is empty and open.
 * Chunks are queued without copying, so producers must not reuse them.
 */
export class RelayBuffer {
  readonly capacity: number;
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private closed = false;
  private failed = false;
  private failure: unknown;
  private readers: Set<Waiter> = new Set();
  private writers: Set<Waiter> = new Set();
  private bytesWritten = 0;
  private bytesRead = 0;
  private peak = 0;
  private detachSignal?: () => void;

  constructor(capacity: number, options: RelayBufferOptions = {}) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Relay buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;

    const signal = options.signal;
    if (signal) {
      if (signal.aborted) {
        this.closeWithError(signal.reason);
      } else {
        const onAbort = () => this.closeWithError(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        this.detachSignal = () => signal.removeEventListener('abort', onAbort);
      }
    }
  }

  /**
   * Queue bytes, waiting for space as needed. Inputs larger than the capacity are split.
   */
  async write(bytes: Uint8Array, signal?: AbortSignal): Promise<void> {
    let offset = 0;

    while (offset < bytes.length) {
      const slice = bytes.subarray(offset, offset + this.capacity);

      while (true) {
        this.assertWritable();
        if (this.buffered + slice.length <= this.capacity) break;
        await this.wait(this.writers, signal);
      }

      this.chunks.push(slice);
      this.buffered += slice.length;
      this.bytesWritten += slice.length;
      this.peak = Math.max(this.peak, this.buffered);
      offset += slice.length;

      this.wakeAll(this.readers);
    }
  }

  /**
   * Take up to maxBytes. Resolves null once the producer has closed and the queue is drained.
   */
  async read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array | null> {
    while (true) {
      if (this.failed) throw this.failure;
      if (this.buffered > 0) break;
      if (this.closed) return null;
      await this.wait(this.readers, signal);
    }

    const out = this.take(Math.max(1, maxBytes));
    this.bytesRead += out.length;
    this.wakeAll(this.writers);
    return out;
  }

  /**
   * Producer finished; readers drain what is left, then see end-of-stream
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.detachSignal?.();
    this.wakeAll(this.readers);
    this.wakeAll(this.writers);
  }

  /**
   * Fail both sides: pending and future reads and writes reject with `error`
   */
  closeWithError(error: unknown): void {
    if (this.failed) return;
    this.failed = true;
    this.failure = error;
    this.closed = true;
    this.detachSignal?.();
    this.chunks = [];
    this.buffered = 0;
    this.wakeAll(this.readers);
    this.wakeAll(this.writers);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): RelayBufferStats {
    return {
      buffered: this.buffered,
      bytesWritten: this.bytesWritten,
      bytesRead: this.bytesRead,
      peak: this.peak,
    };
  }

  /**
   * Consumer view as a web stream; cancelling it abandons the producer
   */
  toReadableStream(chunkSize: number, signal?: AbortSignal): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
      pull: async controller => {
        const chunk = await this.read(chunkSize, signal);
        if (chunk === null) {
          controller.close();
        } else {
          controller.enqueue(chunk);
        }
      },
      cancel: reason => {
        this.closeWithError(reason ?? new Error('Relay consumer cancelled'));
      },
    });
  }

  private assertWritable(): void {
    if (this.failed) throw this.failure;
    if (this.closed) throw new RelayBufferClosedError();
  }

  private take(maxBytes: number): Uint8Array {
    const first = this.chunks[0];
    if (first === undefined) return new Uint8Array(0);

    if (first.length <= maxBytes) {
      this.chunks.shift();
      this.buffered -= first.length;
      return first;
    }

    this.chunks[0] = first.subarray(maxBytes);
    this.buffered -= maxBytes;
    return first.subarray(0, maxBytes);
  }

  private wait(queue: Set<Waiter>, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        queue.delete(wake);
        reject(signal?.reason);
      };

      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      queue.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wakeAll(queue: Set<Waiter>): void {
    const waiters = Array.from(queue);
    queue.clear();
    for (const wake of waiters) wake();
  }
}
