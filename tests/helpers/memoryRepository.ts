import { vi } from 'vitest';

import { RecurringObligation } from '@/lib/obligation';
import type { ObligationLoadResult, RecurringRepository } from '@/lib/repository';
import type { ObligationException, ObligationSnapshot } from '@/models/obligation';
import type { ProjectionFailure } from '@/models/projection';
import type { RealizedTransaction } from '@/models/reconciliation';
import type { IsoDate } from '@/models/recurrence';

/**
 * In-memory repository for planner tests. Series are rebuilt from snapshots on every read,
 * like rows coming back from the database.
 */
export class MemoryRecurringRepository implements RecurringRepository {
  private readonly snapshots = new Map<string, ObligationSnapshot>();
  transactions: RealizedTransaction[] = [];
  loadFailures: ProjectionFailure[] = [];

  saveException = vi.fn(async (obligationId: string, exception: ObligationException) => {
    const snapshot = this.snapshots.get(obligationId);
    if (!snapshot) return;
    const exceptions = snapshot.exceptions.filter((item) => item.originalDate !== exception.originalDate);
    this.snapshots.set(obligationId, { ...snapshot, exceptions: [...exceptions, exception] });
  });

  deleteException = vi.fn(async (obligationId: string, originalDate: IsoDate) => {
    const snapshot = this.snapshots.get(obligationId);
    if (!snapshot) return;
    const exceptions = snapshot.exceptions.filter((item) => item.originalDate !== originalDate);
    this.snapshots.set(obligationId, { ...snapshot, exceptions });
  });

  saveNextOccurrence = vi.fn(async (obligationId: string, date: IsoDate | null) => {
    const snapshot = this.snapshots.get(obligationId);
    if (!snapshot) return;
    this.snapshots.set(obligationId, { ...snapshot, nextOccurrence: date });
  });

  add(...obligations: RecurringObligation[]): this {
    for (const obligation of obligations) {
      this.snapshots.set(obligation.id, obligation.toSnapshot());
    }
    return this;
  }

  async listObligations(accountId: string, options: { activeOnly?: boolean } = {}): Promise<ObligationLoadResult> {
    const obligations = [...this.snapshots.values()]
      .filter((snapshot) => snapshot.accountId === accountId || snapshot.destinationAccountId === accountId)
      .filter((snapshot) => !(options.activeOnly ?? true) || snapshot.isActive)
      .map((snapshot) => RecurringObligation.create(snapshot));
    return { obligations, failures: [...this.loadFailures] };
  }

  async getObligation(id: string): Promise<RecurringObligation | null> {
    const snapshot = this.snapshots.get(id);
    return snapshot ? RecurringObligation.create(snapshot) : null;
  }

  async listRealizedTransactions(accountId: string, from: IsoDate, to: IsoDate): Promise<RealizedTransaction[]> {
    const inWindow = (date: IsoDate | null | undefined) => !!date && date >= from && date <= to;
    return this.transactions.filter(
      (transaction) =>
        transaction.accountId === accountId &&
        (inWindow(transaction.date) || inWindow(transaction.recurringInstanceDate)),
    );
  }
}
