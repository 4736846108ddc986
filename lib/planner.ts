import { allocate, createPayEvent } from '@/lib/allocation';
import { addDays, todayUtc } from '@/lib/dates';
import { NotFoundError, ValidationError } from '@/lib/errors';
import type { RecurringObligation } from '@/lib/obligation';
import { projectAll, projectObligation, validateRange } from '@/lib/projector';
import { nextOnOrAfter } from '@/lib/recurrence';
import { buildReconciliationReport } from '@/lib/reconciliation';
import { SupabaseRecurringRepository, type RecurringRepository } from '@/lib/repository';
import { exceptionInputSchema, isoDateSchema, parseOrThrow } from '@/lib/validation';
import { DEFAULT_PLANNING_HORIZON_DAYS, type AllocationResult, type PayEvent } from '@/models/allocation';
import type { ObligationException } from '@/models/obligation';
import type { BatchProjection, ProjectionFailure } from '@/models/projection';
import type { ReconciliationReport } from '@/models/reconciliation';
import type { IsoDate } from '@/models/recurrence';

export interface PlannerCallOptions {
  signal?: AbortSignal;
}

export interface PaycheckPlan {
  payEvents: PayEvent[];
  allocation: AllocationResult;
  failures: ProjectionFailure[];
}

export interface AccountReconciliation extends ReconciliationReport {
  failures: ProjectionFailure[];
}

/**
 * Application service tying the repository to the projection, reconciliation
 * and allocation engines for one account at a time.
 */
export class RecurringPlannerService {
  private repository: RecurringRepository;

  constructor(repository?: RecurringRepository) {
    this.repository = repository ?? new SupabaseRecurringRepository();
  }

  /**
   * Projected instances of every active series touching the account, grouped by date.
   * @param accountId - account to project
   * @param from - inclusive start
   * @param to - inclusive end
   * @param options - abort signal
   * @returns - batch projection, including rows and series that failed
   */
  async getCalendar(accountId: string, from: IsoDate, to: IsoDate, options: PlannerCallOptions = {}): Promise<BatchProjection> {
    const [start, end] = validateRange(from, to);
    const { obligations, failures } = await this.repository.listObligations(accountId, { activeOnly: true });
    const projection = projectAll(obligations, start, end, options);
    return { ...projection, failures: [...failures, ...projection.failures] };
  }

  /**
   * Compare the projected calendar with what was actually recorded.
   * @param accountId - account to reconcile
   * @param from - inclusive start
   * @param to - inclusive end
   * @param today - reference day for pending/missing, defaults to the current UTC day
   * @returns - per-instance status, summary and orphan links
   */
  async getReconciliation(
    accountId: string,
    from: IsoDate,
    to: IsoDate,
    today: IsoDate = todayUtc(),
    options: PlannerCallOptions = {},
  ): Promise<AccountReconciliation> {
    const calendar = await this.getCalendar(accountId, from, to, options);
    const realized = await this.repository.listRealizedTransactions(accountId, from, to);
    const report = buildReconciliationReport(calendar.instances, realized, today, accountId);
    return { ...report, failures: calendar.failures };
  }

  /**
   * Fund the account's bills (negative transaction series and transfers out) from its
   * income (positive transaction series and transfers in).
   * @param accountId - account to plan
   * @param horizonEnd - last due date considered, defaults to today + DEFAULT_PLANNING_HORIZON_DAYS
   * @param options - `from` (defaults to today) and abort signal
   * @returns - pay events used, allocation result and series that failed to load
   */
  async planPaychecks(
    accountId: string,
    horizonEnd?: IsoDate,
    options: PlannerCallOptions & { from?: IsoDate; today?: IsoDate } = {},
  ): Promise<PaycheckPlan> {
    const today = options.today ?? todayUtc();
    const from = options.from ?? today;
    const end = horizonEnd ?? addDays(today, DEFAULT_PLANNING_HORIZON_DAYS);
    const [start] = validateRange(from, end);

    const { obligations, failures } = await this.repository.listObligations(accountId, { activeOnly: true });
    const incomeSeries = obligations.filter((item) =>
      item.kind === 'transfer' ? item.destinationAccountId === accountId : item.amount.amount > 0,
    );
    const bills = obligations.filter((item) =>
      item.kind === 'transfer' ? item.accountId === accountId : item.amount.amount < 0,
    );

    const payEvents = this.buildPayEvents(incomeSeries, start, end, options);
    const allocation = allocate(payEvents, bills, end, { from: start, signal: options.signal });

    if (allocation.shortfalls.length > 0) {
      console.warn('[planner] Bills without funding before their due date', accountId, allocation.shortfalls.length);
    }
    return { payEvents, allocation, failures };
  }

  private buildPayEvents(
    incomeSeries: RecurringObligation[],
    from: IsoDate,
    to: IsoDate,
    options: PlannerCallOptions,
  ): PayEvent[] {
    const payEvents = projectAll(incomeSeries, from, to, options).instances
      .filter((instance) => instance.amount.amount > 0)
      .map((instance) =>
        createPayEvent({
          date: instance.effectiveDate,
          netAmount: instance.amount,
          description: instance.description,
          sourceObligationId: instance.obligationId,
        }),
      );
    return payEvents;
  }

  /**
   * Add or replace an exception after checking the series exists and accepts it.
   * @throws NotFoundError when the series does not exist
   * @throws ValidationError when the exception is invalid for the series
   */
  async setException(obligationId: string, input: unknown): Promise<ObligationException> {
    const parsed = parseOrThrow(exceptionInputSchema, input, 'Invalid exception');
    const obligation = await this.requireObligation(obligationId);

    const stored =
      parsed.kind === 'skip'
        ? obligation.addOrUpdateException(parsed.originalDate, 'skip')
        : obligation.addOrUpdateException(parsed.originalDate, 'modify', {
            modifiedAmount: parsed.modifiedAmount,
            modifiedDescription: parsed.modifiedDescription,
            modifiedDate: parsed.modifiedDate,
          });

    await this.repository.saveException(obligationId, stored);
    return stored;
  }

  /**
   * @returns - true when an exception existed and was removed
   * @throws NotFoundError when the series does not exist
   */
  async removeException(obligationId: string, originalDate: IsoDate): Promise<boolean> {
    const date = parseOrThrow(isoDateSchema, originalDate, 'Invalid originalDate');
    const obligation = await this.requireObligation(obligationId);
    if (!obligation.removeException(date)) return false;
    await this.repository.deleteException(obligationId, date);
    return true;
  }

  /**
   * Write the cached next-occurrence hint of each active series of the account.
   * The hint is the effective date of the next instance, honouring skips and moves,
   * and is cleared once the series has ended.
   * @returns - number of series updated
   */
  async refreshNextOccurrences(accountId: string, today: IsoDate = todayUtc()): Promise<number> {
    const reference = parseOrThrow(isoDateSchema, today, 'Invalid reference date');
    const { obligations } = await this.repository.listObligations(accountId, { activeOnly: true });
    let updated = 0;

    for (const obligation of obligations) {
      const next = this.findNextInstanceDate(obligation, reference);
      if (next === obligation.nextOccurrence) continue;
      obligation.recordNextOccurrence(next);
      await this.repository.saveNextOccurrence(obligation.id, next);
      updated += 1;
    }
    return updated;
  }

  private findNextInstanceDate(obligation: RecurringObligation, today: IsoDate): IsoDate | null {
    let cursor = today;
    // Bounded: each pass moves past one skipped or back-dated occurrence.
    for (let attempts = 0; attempts <= obligation.exceptions.length; attempts += 1) {
      const candidate = nextOnOrAfter(obligation.pattern, obligation.startDate, cursor);
      if (obligation.endDate !== null && candidate > obligation.endDate) return null;
      const [instance] = projectObligation(obligation, candidate, candidate);
      if (instance && instance.effectiveDate >= today) return instance.effectiveDate;
      cursor = addDays(candidate, 1);
    }
    return null;
  }

  private async requireObligation(obligationId: string): Promise<RecurringObligation> {
    if (obligationId.trim().length === 0) {
      throw new ValidationError('obligationId: obligationId is required');
    }
    const obligation = await this.repository.getObligation(obligationId);
    if (!obligation) {
      throw new NotFoundError(`Recurring obligation ${obligationId} not found`);
    }
    return obligation;
  }
}
