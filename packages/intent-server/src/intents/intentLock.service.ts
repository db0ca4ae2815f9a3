import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

export type IntentLease = {
  intentId: string;
  leaseId: string;
  event: string;
  acquiredAt: number;
  released: boolean;
};

type LeaseEntry = {
  leaseId: string;
  event: string;
  acquiredAt: number;
};

/**
 * Single-writer discipline keyed by intent id.
 *
 * A second transition attempt on a held id is refused rather than queued; the engine
 * reports it as a Conflict. Leases on different ids never contend.
 */
@Injectable()
export class IntentLockService {
  private held = new Map<string, LeaseEntry>();

  currentEvent(intentId: string): string | null {
    return this.held.get(intentId)?.event ?? null;
  }

  tryAcquire(intentId: string, event: string): IntentLease | null {
    if (this.held.has(intentId)) return null;
    const entry: LeaseEntry = { leaseId: uuidv4(), event, acquiredAt: Date.now() };
    this.held.set(intentId, entry);
    return { intentId, leaseId: entry.leaseId, event, acquiredAt: entry.acquiredAt, released: false };
  }

  release(lease: IntentLease): void {
    if (lease.released) return;
    const entry = this.held.get(lease.intentId);
    lease.released = true;
    // Ignore stale or mismatched lease
    if (!entry || entry.leaseId !== lease.leaseId) return;
    this.held.delete(lease.intentId);
  }
}
