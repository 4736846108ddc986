import type { SupabaseClient } from '@supabase/supabase-js';

import { compareIsoDates } from '@/lib/dates';
import { describeError } from '@/lib/errors';
import { money } from '@/lib/money';
import { RecurringObligation } from '@/lib/obligation';
import { exceptionRowSchema, obligationRowSchema, transactionRowSchema, type ExceptionRow, type ObligationRow } from '@/lib/schemas';
import { getServerSupabaseClient } from '@/lib/supabase';
import { handleServiceError, resolveUserId } from '@/lib/utils';
import { accountIdSchema, formatZodError, parseOrThrow } from '@/lib/validation';
import type { ObligationException } from '@/models/obligation';
import type { ProjectionFailure } from '@/models/projection';
import type { RealizedTransaction } from '@/models/reconciliation';
import type { IsoDate } from '@/models/recurrence';

const OBLIGATIONS_TABLE = 'recurring_obligations';
const EXCEPTIONS_TABLE = 'recurring_exceptions';
const TRANSACTIONS_TABLE = 'transactions';
const OBLIGATION_FIELDS =
  'id, user_id, kind, account_id, destination_account_id, amount, currency, description, category_id, frequency, interval, day_of_month, day_of_week, month_of_year, start_date, end_date, is_active, next_occurrence';
const EXCEPTION_FIELDS =
  'obligation_id, original_date, kind, modified_amount, modified_description, modified_date';
const TRANSACTION_FIELDS =
  'id, account_id, date, amount, currency, description, recurring_obligation_id, recurring_instance_date';

/**
 * Series loaded for an account. Rows that could not be turned into a valid series
 * are reported in `failures` instead of aborting the load.
 */
export interface ObligationLoadResult {
  obligations: RecurringObligation[];
  failures: ProjectionFailure[];
}

/**
 * Persistence collaborator used by the planner.
 */
export interface RecurringRepository {
  listObligations(accountId: string, options?: { activeOnly?: boolean }): Promise<ObligationLoadResult>;
  getObligation(id: string): Promise<RecurringObligation | null>;
  /**
   * Transactions of the account dated in `[from, to]`, plus those linked to a series
   * instance whose original date is in `[from, to]`, whatever their own date.
   */
  listRealizedTransactions(accountId: string, from: IsoDate, to: IsoDate): Promise<RealizedTransaction[]>;
  saveException(obligationId: string, exception: ObligationException): Promise<void>;
  deleteException(obligationId: string, originalDate: IsoDate): Promise<void>;
  saveNextOccurrence(obligationId: string, date: IsoDate | null): Promise<void>;
}

/**
 * Supabase-backed repository for recurring series, their exceptions and realized transactions.
 */
export class SupabaseRecurringRepository implements RecurringRepository {
  private client: SupabaseClient;
  private userId: string | undefined;

  constructor(options: { client?: SupabaseClient; userId?: string } = {}) {
    this.client = options.client ?? getServerSupabaseClient();
    this.userId = resolveUserId(options.userId);
  }

  /**
   * Map a stored series row plus its exception rows into the aggregate.
   * @param row - parsed series row
   * @param exceptions - parsed exception rows for that series
   * @returns - series
   */
  private toObligation(row: ObligationRow, exceptions: ExceptionRow[]): RecurringObligation {
    return RecurringObligation.create({
      id: row.id,
      kind: row.kind,
      accountId: row.account_id,
      destinationAccountId: row.destination_account_id,
      amount: money(row.amount, row.currency),
      description: row.description,
      categoryId: row.category_id,
      pattern: {
        frequency: row.frequency,
        interval: row.interval,
        dayOfMonth: row.day_of_month,
        dayOfWeek: row.day_of_week,
        monthOfYear: row.month_of_year,
      },
      startDate: row.start_date,
      endDate: row.end_date,
      isActive: row.is_active,
      nextOccurrence: row.next_occurrence,
      exceptions: exceptions.map((exception) =>
        exception.kind === 'skip'
          ? { kind: 'skip', originalDate: exception.original_date }
          : {
              kind: 'modify',
              originalDate: exception.original_date,
              modifiedAmount: exception.modified_amount,
              modifiedDescription: exception.modified_description,
              modifiedDate: exception.modified_date,
            },
      ),
    });
  }

  /**
   * Load exception rows for several series. Series with an unreadable exception row are
   * listed in `invalid` so they are not projected with a partial overlay.
   */
  private async loadExceptions(
    obligationIds: string[],
  ): Promise<{ grouped: Map<string, ExceptionRow[]>; invalid: Set<string> }> {
    const grouped = new Map<string, ExceptionRow[]>();
    const invalid = new Set<string>();
    if (obligationIds.length === 0) return { grouped, invalid };

    const { data, error } = await this.client
      .from(EXCEPTIONS_TABLE)
      .select(EXCEPTION_FIELDS)
      .in('obligation_id', obligationIds)
      .order('original_date', { ascending: true });

    if (error) {
      handleServiceError('[recurring] Unable to load exceptions', error);
    }

    const rows: unknown[] = data ?? [];
    for (const raw of rows) {
      const parsed = exceptionRowSchema.safeParse(raw);
      if (!parsed.success) {
        const obligationId = typeof raw === 'object' && raw !== null && 'obligation_id' in raw ? String(raw.obligation_id) : '';
        console.warn('[recurring] Invalid exception row', obligationId, formatZodError(parsed.error));
        invalid.add(obligationId);
        continue;
      }
      const list = grouped.get(parsed.data.obligation_id) ?? [];
      list.push(parsed.data);
      grouped.set(parsed.data.obligation_id, list);
    }
    return { grouped, invalid };
  }

  async listObligations(accountId: string, options: { activeOnly?: boolean } = {}): Promise<ObligationLoadResult> {
    const account = parseOrThrow(accountIdSchema, accountId, 'Invalid accountId');
    let query = this.client
      .from(OBLIGATIONS_TABLE)
      .select(OBLIGATION_FIELDS)
      .or(`account_id.eq.${account},destination_account_id.eq.${account}`);
    if (this.userId) {
      query = query.eq('user_id', this.userId);
    }
    if (options.activeOnly ?? true) {
      query = query.eq('is_active', true);
    }

    const { data, error } = await query.order('start_date', { ascending: true });
    if (error) {
      handleServiceError('[recurring] Unable to list recurring obligations', error);
    }

    const rows: unknown[] = data ?? [];
    const parsedRows: ObligationRow[] = [];
    const failures: ProjectionFailure[] = [];

    for (const raw of rows) {
      const parsed = obligationRowSchema.safeParse(raw);
      if (parsed.success) {
        parsedRows.push(parsed.data);
        continue;
      }
      const id = typeof raw === 'object' && raw !== null && 'id' in raw ? String(raw.id) : 'unknown';
      const message = formatZodError(parsed.error);
      console.warn('[recurring] Invalid recurring obligation row', id, message);
      failures.push({ obligationId: id, message });
    }

    const { grouped, invalid } = await this.loadExceptions(parsedRows.map((row) => row.id));
    const obligations: RecurringObligation[] = [];

    for (const row of parsedRows) {
      const rowExceptions = grouped.get(row.id) ?? [];
      if (invalid.has(row.id)) {
        failures.push({ obligationId: row.id, message: 'one or more exception rows are invalid' });
        continue;
      }
      try {
        obligations.push(this.toObligation(row, rowExceptions));
      } catch (mappingError) {
        const message = describeError(mappingError);
        console.warn('[recurring] Skipping recurring obligation', row.id, message);
        failures.push({ obligationId: row.id, message });
      }
    }

    return { obligations, failures };
  }

  async getObligation(id: string): Promise<RecurringObligation | null> {
    let query = this.client.from(OBLIGATIONS_TABLE).select(OBLIGATION_FIELDS).eq('id', id);
    if (this.userId) {
      query = query.eq('user_id', this.userId);
    }

    const { data, error } = await query.maybeSingle();
    if (error) {
      handleServiceError('[recurring] Unable to load recurring obligation', error);
    }
    if (!data) return null;

    const parsed = obligationRowSchema.safeParse(data);
    if (!parsed.success) {
      handleServiceError(`[recurring] Stored recurring obligation ${id} is invalid`, formatZodError(parsed.error));
    }

    const { grouped, invalid } = await this.loadExceptions([parsed.data.id]);
    const rowExceptions = grouped.get(parsed.data.id) ?? [];
    if (invalid.has(parsed.data.id)) {
      handleServiceError(`[recurring] Stored exceptions of ${id} are invalid`, 'invalid exception row');
    }
    return this.toObligation(parsed.data, rowExceptions);
  }

  async listRealizedTransactions(accountId: string, from: IsoDate, to: IsoDate): Promise<RealizedTransaction[]> {
    const account = parseOrThrow(accountIdSchema, accountId, 'Invalid accountId');
    const [dated, linked] = await Promise.all([
      this.loadTransactions(account, 'date', from, to),
      this.loadTransactions(account, 'recurring_instance_date', from, to),
    ]);

    const byId = new Map<string, RealizedTransaction>();
    for (const transaction of [...dated, ...linked]) {
      if (!byId.has(transaction.id)) byId.set(transaction.id, transaction);
    }
    return [...byId.values()].sort((a, b) => compareIsoDates(a.date, b.date) || a.id.localeCompare(b.id));
  }

  /**
   * Transactions of one account whose `field` falls inside the window.
   */
  private async loadTransactions(
    accountId: string,
    field: 'date' | 'recurring_instance_date',
    from: IsoDate,
    to: IsoDate,
  ): Promise<RealizedTransaction[]> {
    let query = this.client
      .from(TRANSACTIONS_TABLE)
      .select(TRANSACTION_FIELDS)
      .eq('account_id', accountId)
      .gte(field, from)
      .lte(field, to);
    if (this.userId) {
      query = query.eq('user_id', this.userId);
    }

    const { data, error } = await query.order('date', { ascending: true });
    if (error) {
      handleServiceError('[recurring] Unable to list realized transactions', error);
    }

    const rows: unknown[] = data ?? [];
    const transactions: RealizedTransaction[] = [];
    for (const raw of rows) {
      const parsed = transactionRowSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('[recurring] Ignoring invalid transaction row', formatZodError(parsed.error));
        continue;
      }
      const row = parsed.data;
      transactions.push({
        id: row.id,
        accountId: row.account_id,
        date: row.date,
        amount: money(row.amount, row.currency),
        description: row.description,
        recurringObligationId: row.recurring_obligation_id,
        recurringInstanceDate: row.recurring_instance_date ?? null,
      });
    }
    return transactions;
  }

  async saveException(obligationId: string, exception: ObligationException): Promise<void> {
    const payload =
      exception.kind === 'skip'
        ? {
            obligation_id: obligationId,
            original_date: exception.originalDate,
            kind: exception.kind,
            modified_amount: null,
            modified_description: null,
            modified_date: null,
          }
        : {
            obligation_id: obligationId,
            original_date: exception.originalDate,
            kind: exception.kind,
            modified_amount: exception.modifiedAmount?.amount ?? null,
            modified_description: exception.modifiedDescription ?? null,
            modified_date: exception.modifiedDate ?? null,
          };

    const { error } = await this.client
      .from(EXCEPTIONS_TABLE)
      .upsert(payload, { onConflict: 'obligation_id,original_date' });
    if (error) {
      handleServiceError('[recurring] Unable to save exception', error);
    }
  }

  async deleteException(obligationId: string, originalDate: IsoDate): Promise<void> {
    const { error } = await this.client
      .from(EXCEPTIONS_TABLE)
      .delete()
      .eq('obligation_id', obligationId)
      .eq('original_date', originalDate);
    if (error) {
      handleServiceError('[recurring] Unable to delete exception', error);
    }
  }

  async saveNextOccurrence(obligationId: string, date: IsoDate | null): Promise<void> {
    const { error } = await this.client
      .from(OBLIGATIONS_TABLE)
      .update({ next_occurrence: date })
      .eq('id', obligationId);
    if (error) {
      handleServiceError('[recurring] Unable to update next occurrence', error);
    }
  }
}
