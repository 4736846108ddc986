import { ValidationError } from '@/lib/errors';
import { absMoney, money } from '@/lib/money';
import {
  exceptionInputSchema,
  exceptionOverridesSchema,
  isoDateSchema,
  obligationInputSchema,
  parseOrThrow,
  recurrencePatternSchema,
  amountOrMoneySchema,
} from '@/lib/validation';
import type {
  ExceptionKind,
  ExceptionOverrides,
  Money,
  ObligationException,
  ObligationKind,
  ObligationSnapshot,
} from '@/models/obligation';
import type { IsoDate, RecurrencePattern } from '@/models/recurrence';

type AmountInput = Money | number;

/**
 * Recurring transaction or transfer series with its per-date exception overlay.
 * Mutations only go through the methods below; each validates before touching state.
 */
export class RecurringObligation {
  readonly id: string;
  readonly kind: ObligationKind;
  readonly accountId: string;
  readonly destinationAccountId: string | null;
  private _amount: Money;
  private _description: string;
  private _categoryId: string | null;
  private _pattern: RecurrencePattern;
  private _startDate: IsoDate;
  private _endDate: IsoDate | null;
  private _isActive: boolean;
  private _nextOccurrence: IsoDate | null;
  private readonly overlay = new Map<IsoDate, ObligationException>();

  private constructor(snapshot: Omit<ObligationSnapshot, 'exceptions'>) {
    this.id = snapshot.id;
    this.kind = snapshot.kind;
    this.accountId = snapshot.accountId;
    this.destinationAccountId = snapshot.destinationAccountId;
    this._amount = snapshot.amount;
    this._description = snapshot.description;
    this._categoryId = snapshot.categoryId;
    this._pattern = snapshot.pattern;
    this._startDate = snapshot.startDate;
    this._endDate = snapshot.endDate;
    this._isActive = snapshot.isActive;
    this._nextOccurrence = snapshot.nextOccurrence;
  }

  /**
   * Validate and build a series.
   * @param input - untrusted payload, checked against obligationInputSchema
   * @returns - new series, active unless stated otherwise
   * @throws ValidationError on any invalid field; nothing is built in that case
   */
  static create(input: unknown): RecurringObligation {
    const parsed = parseOrThrow(obligationInputSchema, input, 'Invalid recurring obligation');
    const currency = typeof parsed.amount === 'number' ? parsed.currency : parsed.currency ?? parsed.amount.currency;
    const amount = RecurringObligation.checkAmount(parsed.kind, parsed.amount, currency, 'amount');

    const obligation = new RecurringObligation({
      id: parsed.id,
      kind: parsed.kind,
      accountId: parsed.accountId,
      destinationAccountId: parsed.destinationAccountId ?? null,
      amount,
      description: parsed.description,
      categoryId: parsed.categoryId ?? null,
      pattern: parsed.pattern,
      startDate: parsed.startDate,
      endDate: parsed.endDate ?? null,
      isActive: parsed.isActive,
      nextOccurrence: parsed.nextOccurrence ?? null,
    });

    for (const exception of parsed.exceptions) {
      if (exception.kind === 'skip') {
        obligation.addOrUpdateException(exception.originalDate, 'skip');
      } else {
        const { kind: _kind, originalDate, ...overrides } = exception;
        obligation.addOrUpdateException(originalDate, 'modify', overrides);
      }
    }
    return obligation;
  }

  /**
   * Normalise an amount and apply the sign rule of the series kind:
   * transactions are non-zero (sign = direction), transfers are positive.
   */
  private static checkAmount(
    kind: ObligationKind,
    value: AmountInput,
    currency: string | undefined,
    field: string,
  ): Money {
    const normalized = typeof value === 'number' ? money(value, currency) : money(value.amount, currency ?? value.currency);
    if (typeof value !== 'number' && currency !== undefined && value.currency.toUpperCase() !== normalized.currency) {
      throw new ValidationError(`${field}: currency ${value.currency} does not match ${normalized.currency}`);
    }
    if (kind === 'transaction' && normalized.amount === 0) {
      throw new ValidationError(`${field}: amount must not be zero`);
    }
    if (kind === 'transfer' && normalized.amount <= 0) {
      throw new ValidationError(`${field}: transfer amount must be greater than 0`);
    }
    return normalized;
  }

  get amount(): Money {
    return this._amount;
  }

  get description(): string {
    return this._description;
  }

  get categoryId(): string | null {
    return this._categoryId;
  }

  get pattern(): RecurrencePattern {
    return this._pattern;
  }

  get startDate(): IsoDate {
    return this._startDate;
  }

  get endDate(): IsoDate | null {
    return this._endDate;
  }

  get isActive(): boolean {
    return this._isActive;
  }

  /**
   * Cached hint maintained by the persistence layer. Projection never reads it.
   */
  get nextOccurrence(): IsoDate | null {
    return this._nextOccurrence;
  }

  /**
   * Exceptions ordered by original date.
   */
  get exceptions(): ObligationException[] {
    return [...this.overlay.values()].sort((a, b) => (a.originalDate < b.originalDate ? -1 : 1));
  }

  /**
   * Positive magnitude of the default amount.
   */
  get magnitude(): Money {
    return absMoney(this._amount);
  }

  updateAmount(amount: AmountInput): void {
    const parsed = parseOrThrow(amountOrMoneySchema, amount, 'Invalid amount');
    if (typeof parsed !== 'number' && parsed.currency !== this._amount.currency) {
      throw new ValidationError(`amount: currency ${parsed.currency} does not match ${this._amount.currency}`);
    }
    this._amount = RecurringObligation.checkAmount(this.kind, parsed, this._amount.currency, 'amount');
  }

  updateDescription(description: string): void {
    const trimmed = description.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('description: description is required');
    }
    if (trimmed.length > 240) {
      throw new ValidationError('description: description must be at most 240 characters');
    }
    this._description = trimmed;
  }

  updateCategory(categoryId: string | null): void {
    this._categoryId = categoryId?.trim() || null;
  }

  /**
   * Replace the pattern and, optionally, the validity window.
   * Pass `endDate: null` to make the series open-ended.
   */
  reschedule(changes: { pattern?: unknown; startDate?: IsoDate; endDate?: IsoDate | null }): void {
    const pattern = changes.pattern === undefined
      ? this._pattern
      : parseOrThrow(recurrencePatternSchema, changes.pattern, 'Invalid recurrence pattern');
    const startDate = changes.startDate === undefined
      ? this._startDate
      : parseOrThrow(isoDateSchema, changes.startDate, 'Invalid startDate');
    const endDate = changes.endDate === undefined
      ? this._endDate
      : changes.endDate === null
        ? null
        : parseOrThrow(isoDateSchema, changes.endDate, 'Invalid endDate');

    if (endDate !== null && endDate < startDate) {
      throw new ValidationError('endDate: endDate must be on or after startDate');
    }

    this._pattern = pattern;
    this._startDate = startDate;
    this._endDate = endDate;
    // The cached hint belongs to the old schedule.
    this._nextOccurrence = null;
  }

  /**
   * Stop future projection. Exceptions and history stay in place.
   */
  deactivate(): void {
    this._isActive = false;
  }

  activate(): void {
    this._isActive = true;
  }

  recordNextOccurrence(date: IsoDate | null): void {
    this._nextOccurrence = date === null ? null : parseOrThrow(isoDateSchema, date, 'Invalid nextOccurrence');
  }

  getException(originalDate: IsoDate): ObligationException | undefined {
    return this.overlay.get(originalDate);
  }

  /**
   * Insert or replace the exception for one original date.
   * @param originalDate - scheduled date the override applies to
   * @param kind - 'skip' or 'modify'
   * @param overrides - modify fields; must be empty for 'skip'
   * @returns - stored exception
   * @throws ValidationError when a skip carries overrides or a modify carries none
   */
  addOrUpdateException(originalDate: IsoDate, kind: ExceptionKind, overrides: ExceptionOverrides = {}): ObligationException {
    const parsed = parseOrThrow(
      exceptionInputSchema,
      kind === 'skip' ? { kind, originalDate } : { kind, originalDate, ...overrides },
      `Invalid exception for ${this.id}`,
    );
    const fields = parseOrThrow(exceptionOverridesSchema, overrides, `Invalid exception for ${this.id}`);
    const hasOverride =
      fields.modifiedAmount !== undefined ||
      fields.modifiedDescription !== undefined ||
      fields.modifiedDate !== undefined;

    let exception: ObligationException;
    if (parsed.kind === 'skip') {
      if (hasOverride) {
        throw new ValidationError('exception: skip exceptions carry no override fields');
      }
      exception = { kind: 'skip', originalDate: parsed.originalDate };
    } else {
      if (!hasOverride) {
        throw new ValidationError('exception: at least one modification is required (amount, description, or date)');
      }
      exception = {
        kind: 'modify',
        originalDate: parsed.originalDate,
        ...(fields.modifiedAmount !== undefined
          ? { modifiedAmount: this.exceptionAmount(fields.modifiedAmount) }
          : {}),
        ...(fields.modifiedDescription !== undefined ? { modifiedDescription: fields.modifiedDescription } : {}),
        ...(fields.modifiedDate !== undefined ? { modifiedDate: fields.modifiedDate } : {}),
      };
    }

    this.overlay.set(exception.originalDate, exception);
    return exception;
  }

  private exceptionAmount(value: AmountInput): Money {
    if (typeof value !== 'number' && value.currency !== this._amount.currency) {
      throw new ValidationError(
        `modifiedAmount: currency ${value.currency} does not match ${this._amount.currency}`,
      );
    }
    return RecurringObligation.checkAmount(this.kind, value, this._amount.currency, 'modifiedAmount');
  }

  /**
   * @returns - true when an exception existed for that date
   */
  removeException(originalDate: IsoDate): boolean {
    return this.overlay.delete(originalDate);
  }

  toSnapshot(): ObligationSnapshot {
    return {
      id: this.id,
      kind: this.kind,
      accountId: this.accountId,
      destinationAccountId: this.destinationAccountId,
      amount: this._amount,
      description: this._description,
      categoryId: this._categoryId,
      pattern: this._pattern,
      startDate: this._startDate,
      endDate: this._endDate,
      isActive: this._isActive,
      nextOccurrence: this._nextOccurrence,
      exceptions: this.exceptions,
    };
  }
}
