/**
 * Per-model exclusive leases
 *
 * A reconciliation pass holds the lease on its model for its whole duration.
 * Distinct models never wait on each other.
 */

export interface Lease {
  readonly key: string;
  readonly holder: string;
  /** Release the lease; later calls do nothing */
  release(): void;
}

export interface LeaseProvider {
  acquire(key: string, holder: string): Promise<Lease>;
}

interface Waiter {
  holder: string;
  grant: (lease: Lease) => void;
}

/**
 * Single-process lease provider. Waiters are served in arrival order.
 * A deployment running several workers substitutes a distributed provider.
 */
export class InProcessLeaseProvider implements LeaseProvider {
  private holders = new Map<string, string>();
  private queues = new Map<string, Waiter[]>();

  acquire(key: string, holder: string): Promise<Lease> {
    if (!this.holders.has(key)) {
      this.holders.set(key, holder);
      return Promise.resolve(this.createLease(key, holder));
    }

    return new Promise((resolve) => {
      const queue = this.queues.get(key) ?? [];
      queue.push({ holder, grant: resolve });
      this.queues.set(key, queue);
    });
  }

  /** Current holder of a key */
  holderOf(key: string): string | undefined {
    return this.holders.get(key);
  }

  /** Number of callers waiting for a key */
  waiting(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  private createLease(key: string, holder: string): Lease {
    let released = false;
    return {
      key,
      holder,
      release: () => {
        if (released) return;
        released = true;
        this.handOver(key);
      },
    };
  }

  private handOver(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.queues.delete(key);
    }

    if (!next) {
      this.holders.delete(key);
      return;
    }
    this.holders.set(key, next.holder);
    next.grant(this.createLease(key, next.holder));
  }
}
