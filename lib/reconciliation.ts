import { todayUtc } from '@/lib/dates';
import { roundCurrency } from '@/lib/money';
import { isoDateSchema, parseOrThrow } from '@/lib/validation';
import type { Money } from '@/models/obligation';
import type { ProjectedInstance } from '@/models/projection';
import type {
  RealizedTransaction,
  ReconciledInstance,
  ReconciliationReport,
  ReconciliationStatus,
  ReconciliationSummary,
} from '@/models/reconciliation';
import type { IsoDate } from '@/models/recurrence';

const instanceKey = (obligationId: string, originalDate: IsoDate) => `${obligationId}|${originalDate}`;

/**
 * Index realized transactions by the series instance they were generated from.
 * The first transaction seen for a key wins.
 */
function indexLinkedTransactions(realized: readonly RealizedTransaction[]): Map<string, RealizedTransaction> {
  const linked = new Map<string, RealizedTransaction>();
  for (const transaction of realized) {
    if (!transaction.recurringObligationId || !transaction.recurringInstanceDate) continue;
    const key = instanceKey(transaction.recurringObligationId, transaction.recurringInstanceDate);
    if (!linked.has(key)) linked.set(key, transaction);
  }
  return linked;
}

function classify(instance: ProjectedInstance, today: IsoDate, matched: boolean): ReconciliationStatus {
  if (matched) return 'matched';
  return instance.effectiveDate >= today ? 'pending' : 'missing';
}

/**
 * Classify projected instances against recorded transactions.
 * matched: a transaction links to (obligationId, originalDate);
 * pending: unmatched, effective date today or later;
 * missing: unmatched, effective date before today.
 * @param instances - projected instances
 * @param realized - recorded transactions for the same account and window
 * @param today - reference day, defaults to the current UTC day
 * @returns - one entry per instance, in input order
 */
export function reconcileInstances(
  instances: readonly ProjectedInstance[],
  realized: readonly RealizedTransaction[],
  today: IsoDate = todayUtc(),
): ReconciledInstance[] {
  const reference = parseOrThrow(isoDateSchema, today, 'Invalid reference date');
  const linked = indexLinkedTransactions(realized);

  return instances.map((instance) => {
    const match = linked.get(instanceKey(instance.obligationId, instance.originalDate));
    return {
      instance,
      status: classify(instance, reference, match !== undefined),
      matchedTransactionId: match?.id ?? null,
    };
  });
}

/**
 * Signed effect of an instance on `accountId`: the outflow leg of a transfer is negative.
 * Without an account the series amount is used.
 */
function amountForAccount(instance: ProjectedInstance, accountId?: string): Money {
  if (accountId === undefined) return instance.amount;
  return instance.legs.find((leg) => leg.accountId === accountId)?.amount ?? instance.amount;
}

/**
 * Count statuses and total the missing amounts per currency.
 * @param reconciled - classified instances
 * @param accountId - account the totals are seen from
 */
export function summarizeReconciliation(
  reconciled: readonly ReconciledInstance[],
  accountId?: string,
): ReconciliationSummary {
  const summary: ReconciliationSummary = { matched: 0, pending: 0, missing: 0, missingTotals: {} };
  for (const entry of reconciled) {
    summary[entry.status] += 1;
    if (entry.status === 'missing') {
      const { currency, amount } = amountForAccount(entry.instance, accountId);
      summary.missingTotals[currency] = roundCurrency((summary.missingTotals[currency] ?? 0) + amount);
    }
  }
  return summary;
}

/**
 * Full report: classification, summary counts and linked transactions that point
 * at no projected instance (e.g. an instance that was later skipped).
 * Pass `accountId` to total transfers with the sign of that account's leg.
 */
export function buildReconciliationReport(
  instances: readonly ProjectedInstance[],
  realized: readonly RealizedTransaction[],
  today: IsoDate = todayUtc(),
  accountId?: string,
): ReconciliationReport {
  const reconciled = reconcileInstances(instances, realized, today);
  const projectedKeys = new Set(instances.map((instance) => instanceKey(instance.obligationId, instance.originalDate)));
  const unmatchedLinks = realized.filter(
    (transaction) =>
      !!transaction.recurringObligationId &&
      !!transaction.recurringInstanceDate &&
      !projectedKeys.has(instanceKey(transaction.recurringObligationId, transaction.recurringInstanceDate)),
  );

  return {
    instances: reconciled,
    unmatchedLinks,
    summary: summarizeReconciliation(reconciled, accountId),
  };
}
