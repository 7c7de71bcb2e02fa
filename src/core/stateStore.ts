import EventEmitter from 'eventemitter3';
import { InvalidStateError, describeError } from './errors';
import { Logger, Membership, WindowId } from './types';

export interface StateSnapshot {
  sticky: WindowId[];
  staged: WindowId[];
}

/**
 * Exclusive view of both sets, valid only for the duration of the transaction
 * body that received it.
 */
export interface StateTransaction {
  membershipOf(windowId: WindowId): Membership | undefined;
  /** Returns false when the window already belonged to `membership`. */
  attach(windowId: WindowId, membership: Membership): boolean;
  /** Returns false when the window did not belong to `membership`. */
  detach(windowId: WindowId, membership: Membership): boolean;
  restore(windowId: WindowId, membership: Membership | undefined): void;
  ids(membership: Membership): WindowId[];
  transfer(windowIds: readonly WindowId[], from: Membership, to: Membership): WindowId[];
  pruneSticky(liveWindowIds: ReadonlySet<WindowId>): WindowId[];
}

interface StateStoreEvents {
  changed: (snapshot: StateSnapshot) => void;
}

export class StateStore extends EventEmitter<StateStoreEvents> {
  // One entry per window makes sticky/staged disjoint by construction.
  private readonly memberships = new Map<WindowId, Membership>();
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger = console) {
    super();
  }

  /**
   * Runs `body` with exclusive access to both sets. Transactions run one at a
   * time in call order; a rejected body rejects its own caller and the queue
   * moves on to the next one.
   */
  transaction<T>(body: (tx: StateTransaction) => Promise<T> | T): Promise<T> {
    const run = this.queue.then(() => this.execute(body));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  snapshot(): Promise<StateSnapshot> {
    return this.transaction(() => this.currentSnapshot());
  }

  private async execute<T>(body: (tx: StateTransaction) => Promise<T> | T): Promise<T> {
    const before = this.currentSnapshot();
    let open = true;
    const memberships = this.memberships;

    const guard = (): void => {
      if (!open) {
        throw new Error('State transaction used after it completed.');
      }
    };

    const tx: StateTransaction = {
      membershipOf(windowId) {
        return memberships.get(windowId);
      },
      attach(windowId, membership) {
        guard();
        const current = memberships.get(windowId);
        if (current === membership) {
          return false;
        }
        if (current !== undefined) {
          throw new InvalidStateError(`Window ${windowId} is already ${current}`);
        }
        memberships.set(windowId, membership);
        return true;
      },
      detach(windowId, membership) {
        guard();
        if (memberships.get(windowId) !== membership) {
          return false;
        }
        memberships.delete(windowId);
        return true;
      },
      restore(windowId, membership) {
        guard();
        if (memberships.get(windowId) === membership) {
          return;
        }
        if (membership === undefined) {
          memberships.delete(windowId);
        } else {
          memberships.set(windowId, membership);
        }
      },
      ids(membership) {
        return sortedIds(memberships, membership);
      },
      transfer(windowIds, from, to) {
        guard();
        const moved: WindowId[] = [];
        windowIds.forEach((windowId) => {
          if (memberships.get(windowId) === from) {
            memberships.set(windowId, to);
            moved.push(windowId);
          }
        });
        return moved;
      },
      pruneSticky(liveWindowIds) {
        guard();
        const pruned: WindowId[] = [];
        memberships.forEach((membership, windowId) => {
          if (membership === 'sticky' && !liveWindowIds.has(windowId)) {
            pruned.push(windowId);
          }
        });
        pruned.forEach((windowId) => memberships.delete(windowId));
        return pruned.sort((a, b) => a - b);
      }
    };

    let result: T;
    try {
      result = await body(tx);
    } catch (error) {
      open = false;
      this.publishChange(before);
      throw error;
    }
    open = false;
    this.publishChange(before);
    return result;
  }

  // Listeners run after the body settled; their failures never reach the caller.
  private publishChange(before: StateSnapshot): void {
    const after = this.currentSnapshot();
    if (sameSnapshot(before, after)) {
      return;
    }
    try {
      this.emit('changed', after);
    } catch (error) {
      this.logger.error(`State change listener failed: ${describeError(error)}`);
    }
  }

  private currentSnapshot(): StateSnapshot {
    return {
      sticky: sortedIds(this.memberships, 'sticky'),
      staged: sortedIds(this.memberships, 'staged')
    };
  }
}

function sortedIds(memberships: ReadonlyMap<WindowId, Membership>, membership: Membership): WindowId[] {
  const ids: WindowId[] = [];
  memberships.forEach((value, windowId) => {
    if (value === membership) {
      ids.push(windowId);
    }
  });
  return ids.sort((a, b) => a - b);
}

function sameSnapshot(left: StateSnapshot, right: StateSnapshot): boolean {
  return sameIds(left.sticky, right.sticky) && sameIds(left.staged, right.staged);
}

function sameIds(left: readonly WindowId[], right: readonly WindowId[]): boolean {
  return left.length === right.length && left.every((windowId, index) => windowId === right[index]);
}
