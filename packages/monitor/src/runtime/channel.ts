export type ReceiveResult<T> = { done: false; value: T } | { done: true };

interface PendingSend<T> {
  value: T;
  resolve: (delivered: boolean) => void;
}

type PendingReceive<T> = (result: ReceiveResult<T>) => void;

const DONE = { done: true } as const;

/**
 * Bounded FIFO between asynchronous tasks.
 *
 * Producers choose between `trySend` (drop when full) and `send` (wait for
 * space). Closing wakes every waiter: senders resolve `false`, receivers drain
 * what is buffered and then see `{ done: true }`.
 */
export class Channel<T> implements AsyncIterable<T> {
  /** Boxed so that `T` may itself include undefined. */
  private readonly buffer: Array<{ value: T }> = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (capacity < 0 || !Number.isInteger(capacity)) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /** Values currently buffered */
  get length(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  trySend(value: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return true;
    }
    return false;
  }

  /** Resolves `true` once the value is accepted, `false` on close or abort. */
  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.trySend(value)) return Promise.resolve(true);
    if (this.closed || signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const pending: PendingSend<T> = {
        value,
        resolve: (delivered) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(delivered);
        },
      };
      const onAbort = (): void => {
        const index = this.senders.indexOf(pending);
        if (index !== -1) {
          this.senders.splice(index, 1);
          pending.resolve(false);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  receive(signal?: AbortSignal): Promise<ReceiveResult<T>> {
    const ready = this.takeReady();
    if (ready) return Promise.resolve(ready);
    if (this.closed || signal?.aborted) return Promise.resolve(DONE);

    return new Promise<ReceiveResult<T>>((resolve) => {
      const pending: PendingReceive<T> = (result) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      const onAbort = (): void => {
        const index = this.receivers.indexOf(pending);
        if (index !== -1) {
          this.receivers.splice(index, 1);
          pending(DONE);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  /** Returns `true` only for the call that actually closed the channel. */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    // Receivers only wait on an empty buffer.
    for (const receiver of this.receivers.splice(0)) {
      receiver(DONE);
    }
    return true;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  private takeReady(): ReceiveResult<T> | undefined {
    const head = this.buffer.shift();
    const sender = this.senders.shift();

    if (head) {
      // Refill from the oldest blocked sender to keep FIFO order.
      if (sender) {
        this.buffer.push({ value: sender.value });
        sender.resolve(true);
      }
      return { done: false, value: head.value };
    }

    if (sender) {
      sender.resolve(true);
      return { done: false, value: sender.value };
    }
    return undefined;
  }
}
