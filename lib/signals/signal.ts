/**
 * Minimal typed signal: receivers are awaited in connection order and any
 * receiver error propagates to the sender.
 */

export type Receiver<P> = (payload: P) => void | Promise<void>;

export interface ConnectOptions {
  /** Connecting again with the same uid is a no-op. */
  dispatchUid?: string;
}

export class Signal<P> {
  private readonly receivers = new Map<string, Receiver<P>>();
  private anonymousCount = 0;

  constructor(readonly name: string) {}

  connect(receiver: Receiver<P>, options: ConnectOptions = {}): string {
    const uid = options.dispatchUid ?? `${this.name}#${++this.anonymousCount}`;
    if (!this.receivers.has(uid)) {
      this.receivers.set(uid, receiver);
    }
    return uid;
  }

  disconnect(uid: string): boolean {
    return this.receivers.delete(uid);
  }

  hasReceivers(): boolean {
    return this.receivers.size > 0;
  }

  async send(payload: P): Promise<void> {
    for (const receiver of [...this.receivers.values()]) {
      await receiver(payload);
    }
  }
}
