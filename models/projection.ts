import type { Money, ObligationKind } from '@/models/obligation';
import type { IsoDate } from '@/models/recurrence';

/**
 * Largest window a single projection call may cover (10 years).
 */
export const MAX_PROJECTION_SPAN_DAYS = 3660;

/**
 * Ledger effect of an instance on one account.
 */
export interface InstanceLeg {
  accountId: string;
  amount: Money;
}

/**
 * Concrete, exception-adjusted event derived from a series. Never persisted.
 */
export interface ProjectedInstance {
  obligationId: string;
  kind: ObligationKind;
  /** Date produced by the pattern; key for exception lookups and reconciliation. */
  originalDate: IsoDate;
  /** Date used for ordering and presentation (modified date when moved). */
  effectiveDate: IsoDate;
  amount: Money;
  description: string;
  categoryId: string | null;
  isModified: boolean;
  legs: InstanceLeg[];
}

export interface ProjectionOptions {
  signal?: AbortSignal;
}

/**
 * A series that could not be projected in a batch call.
 */
export interface ProjectionFailure {
  obligationId: string;
  message: string;
}

export interface BatchProjection {
  /** Instances grouped by effective date, keys in ascending order. */
  byDate: Map<IsoDate, ProjectedInstance[]>;
  instances: ProjectedInstance[];
  failures: ProjectionFailure[];
}
