/**
 * ReplyMailbox: the private reply address of one session.
 *
 * Replies that arrive while nobody waits are queued. A call flushes the
 * queue before publishing, then waits: queued replies are offered first,
 * later ones as they arrive. The caller's `decide` function settles the
 * wait or discards the reply and keeps waiting.
 *
 * The queue holds at most `limit` replies; the oldest is dropped to make
 * room and counted with the next flush.
 */

export const DEFAULT_MAILBOX_LIMIT = 64;

export type ReplyDecision<T> =
  | { type: 'resolve'; value: T }
  | { type: 'reject'; error: Error }
  | { type: 'discard' };

interface ActiveWait {
  offer(payload: Buffer): void;
  cancel(error: Error): void;
}

export class ReplyMailbox {
  private readonly queue: Buffer[] = [];
  private active: ActiveWait | null = null;
  private closedWith: Error | null = null;
  private overflowed = 0;

  constructor(private readonly limit: number = DEFAULT_MAILBOX_LIMIT) {}

  /** Replies queued with no wait in progress. */
  get size(): number {
    return this.queue.length;
  }

  get waiting(): boolean {
    return this.active !== null;
  }

  deliver(payload: Buffer): void {
    if (this.closedWith) return;
    if (this.active) {
      this.active.offer(payload);
      return;
    }
    if (this.queue.length >= this.limit) {
      this.queue.shift();
      this.overflowed++;
    }
    this.queue.push(payload);
  }

  /** Drop every queued reply. Returns how many were dropped, overflow included. */
  flush(): number {
    const count = this.queue.length + this.overflowed;
    this.queue.length = 0;
    this.overflowed = 0;
    return count;
  }

  wait<T>(
    timeoutMs: number,
    decide: (payload: Buffer) => ReplyDecision<T>,
    onTimeout: () => Error,
  ): Promise<T> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (this.active) {
      return Promise.reject(new Error('A reply wait is already in progress'));
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const finish = (): void => {
        settled = true;
        clearTimeout(timer);
        this.active = null;
      };

      const timer = setTimeout(() => {
        finish();
        reject(onTimeout());
      }, timeoutMs);

      const offer = (payload: Buffer): void => {
        if (settled) return;
        const decision = decide(payload);
        if (decision.type === 'discard') return;
        finish();
        if (decision.type === 'resolve') {
          resolve(decision.value);
        } else {
          reject(decision.error);
        }
      };

      this.active = {
        offer,
        cancel: (error) => {
          if (settled) return;
          finish();
          reject(error);
        },
      };

      while (!settled && this.queue.length > 0) {
        const next = this.queue.shift();
        if (next) offer(next);
      }
    });
  }

  /** Reject the current wait and refuse all later ones with `error`. */
  close(error: Error): void {
    this.closedWith = error;
    this.queue.length = 0;
    this.overflowed = 0;
    this.active?.cancel(error);
  }
}
