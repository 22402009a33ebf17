/**
 * Hub Inbox
 *
 * The hub's only input. Two lanes:
 * - control: connection lifecycle, snapshot deliveries and client requests
 * - broadcast: bounded; updates from producers and the refresher
 *
 * Client requests on the control lane are bounded per source; lifecycle
 * items are bounded by the number of connections and always accepted.
 * A full broadcast lane rejects the NEW item (drop-newest). When both lanes
 * hold items they are served round-robin so neither starves the other.
 */

export type InboxItem<C, B> =
  | { lane: "control"; item: C }
  | { lane: "broadcast"; item: B };

interface ControlEntry<C> {
  item: C;
  source?: object;
}

export class HubInbox<C, B> {
  private readonly control: ControlEntry<C>[] = [];
  /** Queued client requests per source */
  private readonly pendingBySource = new Map<object, number>();
  private readonly broadcasts: B[] = [];
  private waiter: ((item: InboxItem<C, B> | null) => void) | null = null;
  private preferBroadcast = false;
  private closed = false;

  constructor(
    readonly broadcastCapacity: number,
    readonly requestCapacity: number = Number.MAX_SAFE_INTEGER
  ) {
    if (!Number.isInteger(broadcastCapacity) || broadcastCapacity < 1) {
      throw new RangeError(`broadcastCapacity must be a positive integer, got ${broadcastCapacity}`);
    }
    if (!Number.isInteger(requestCapacity) || requestCapacity < 1) {
      throw new RangeError(`requestCapacity must be a positive integer, got ${requestCapacity}`);
    }
  }

  get pendingControl(): number {
    return this.control.length;
  }

  pendingRequests(source: object): number {
    return this.pendingBySource.get(source) ?? 0;
  }

  get pendingBroadcasts(): number {
    return this.broadcasts.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue a control request. False once the inbox is closed.
   */
  postControl(item: C): boolean {
    if (this.closed) return false;
    this.control.push({ item });
    this.wake();
    return true;
  }

  /**
   * Queue a client request on the control lane. False when `source`
   * already has `requestCapacity` requests waiting, or the inbox is closed.
   */
  offerRequest(source: object, item: C): boolean {
    if (this.closed) return false;
    const pending = this.pendingRequests(source);
    if (pending >= this.requestCapacity) return false;

    this.pendingBySource.set(source, pending + 1);
    this.control.push({ item, source });
    this.wake();
    return true;
  }

  /**
   * Queue a broadcast without blocking. False when the lane is full or the
   * inbox is closed; the item is discarded.
   */
  offerBroadcast(item: B): boolean {
    if (this.closed || this.broadcasts.length >= this.broadcastCapacity) return false;
    this.broadcasts.push(item);
    this.wake();
    return true;
  }

  /**
   * Wait for the next item. Resolves null once the inbox is closed.
   * Only one consumer may wait at a time.
   */
  next(): Promise<InboxItem<C, B> | null> {
    if (this.closed) return Promise.resolve(null);

    const item = this.take();
    if (item) return Promise.resolve(item);

    if (this.waiter) {
      return Promise.reject(new Error("HubInbox supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting items, discard queued ones and release the consumer.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.control.length = 0;
    this.pendingBySource.clear();
    this.broadcasts.length = 0;

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  private wake(): void {
    if (!this.waiter) return;
    const item = this.take();
    if (!item) return;

    const waiter = this.waiter;
    this.waiter = null;
    waiter(item);
  }

  private take(): InboxItem<C, B> | undefined {
    const hasControl = this.control.length > 0;
    const hasBroadcast = this.broadcasts.length > 0;
    if (!hasControl && !hasBroadcast) return undefined;

    const useBroadcast = hasBroadcast && (!hasControl || this.preferBroadcast);
    this.preferBroadcast = !useBroadcast;

    if (useBroadcast) {
      const item = this.broadcasts.shift();
      return item === undefined ? undefined : { lane: "broadcast", item };
    }
    const entry = this.control.shift();
    if (!entry) return undefined;
    if (entry.source) this.release(entry.source);
    return { lane: "control", item: entry.item };
  }

  private release(source: object): void {
    const pending = this.pendingRequests(source) - 1;
    if (pending > 0) {
      this.pendingBySource.set(source, pending);
    } else {
      this.pendingBySource.delete(source);
    }
  }
}
