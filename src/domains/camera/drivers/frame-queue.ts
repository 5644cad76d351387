/**
 * Cuts a raw video byte stream into fixed-size frames and keeps only the
 * newest `capacity` of them. Readers that arrive while the queue is empty
 * wait for the next complete frame.
 *
 * Incoming chunks are held as-is until a whole frame is buffered, so each
 * frame costs at most one copy.
 */
export class FrameQueue {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private frames: Buffer[] = [];
  private waiters: ((frame: Buffer | null) => void)[] = [];
  private closed = false;

  constructor(
    readonly frameSize: number,
    private capacity = 1
  ) {
    if (frameSize <= 0) {
      throw new RangeError(`frameSize must be positive, got ${frameSize}`);
    }
  }

  setCapacity(capacity: number): void {
    this.capacity = capacity;
    this.trim();
  }

  get size(): number {
    return this.frames.length;
  }

  get pendingReaders(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(chunk: Buffer): void {
    if (this.closed || chunk.length === 0) return;
    this.chunks.push(chunk);
    this.buffered += chunk.length;

    while (this.buffered >= this.frameSize) {
      this.deliver(this.take(this.frameSize));
    }
  }

  /** Resolves null once the queue is closed or `signal` aborts. */
  next(signal?: AbortSignal): Promise<Buffer | null> {
    const frame = this.frames.shift();
    if (frame) return Promise.resolve(frame);
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(null);
      };
      const waiter = (next: Buffer | null) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(next);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    this.closed = true;
    this.chunks = [];
    this.buffered = 0;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((w) => w(null));
  }

  private take(size: number): Buffer {
    const parts: Buffer[] = [];
    let missing = size;
    while (missing > 0) {
      const head = this.chunks.shift();
      if (!head) break;
      if (head.length <= missing) {
        parts.push(head);
        missing -= head.length;
      } else {
        parts.push(head.subarray(0, missing));
        this.chunks.unshift(head.subarray(missing));
        missing = 0;
      }
    }
    this.buffered -= size;

    const [only] = parts;
    return parts.length === 1 && only ? only : Buffer.concat(parts, size);
  }

  private deliver(frame: Buffer): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
      return;
    }
    this.frames.push(frame);
    this.trim();
  }

  private trim(): void {
    while (this.frames.length > this.capacity) {
      this.frames.shift();
    }
  }
}
