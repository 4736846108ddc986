import type { Money } from '@/models/obligation';
import type { ProjectedInstance } from '@/models/projection';
import type { IsoDate } from '@/models/recurrence';

/**
 * Transaction already recorded in the ledger.
 * `recurringObligationId` + `recurringInstanceDate` are set when it was generated from a series.
 */
export interface RealizedTransaction {
  id: string;
  accountId: string;
  date: IsoDate;
  amount: Money;
  description?: string | null;
  recurringObligationId?: string | null;
  recurringInstanceDate?: IsoDate | null;
}

export type ReconciliationStatus = 'matched' | 'pending' | 'missing';

export interface ReconciledInstance {
  instance: ProjectedInstance;
  status: ReconciliationStatus;
  matchedTransactionId: string | null;
}

export interface ReconciliationSummary {
  matched: number;
  pending: number;
  missing: number;
  /** Sum of missing instance amounts per currency, signed for the reconciled account. */
  missingTotals: Record<string, number>;
}

export interface ReconciliationReport {
  instances: ReconciledInstance[];
  /** Linked transactions pointing at no instance of the projected set. */
  unmatchedLinks: RealizedTransaction[];
  summary: ReconciliationSummary;
}
