import { money, moneyFromCents, toCents } from '@/lib/money';
import { occurrencesPerYear } from '@/lib/recurrence';
import type {
  AllocationWarning,
  BillInfo,
  PaycheckAllocation,
  PaycheckAllocationSummary,
} from '@/models/allocation';
import { DEFAULT_CURRENCY, type Money } from '@/models/obligation';
import type { Frequency } from '@/models/recurrence';

const formatAmount = (value: Money) => `${value.currency} ${value.amount.toFixed(2)}`;

export const warnings = {
  noBillsConfigured: (): AllocationWarning => ({
    type: 'no_bills_configured',
    message: 'No recurring bills are configured. Add recurring transactions to see allocation suggestions.',
    amount: null,
  }),
  noIncomeConfigured: (): AllocationWarning => ({
    type: 'no_income_configured',
    message: 'Enter your paycheck amount to see income-related warnings and remaining balance calculations.',
    amount: null,
  }),
  insufficientIncome: (shortfall: Money): AllocationWarning => ({
    type: 'insufficient_income',
    message: `Your bills require more than your paycheck amount. Shortfall: ${formatAmount(shortfall)} per paycheck.`,
    amount: shortfall,
  }),
  cannotReconcile: (annualBills: Money, annualIncome: Money): AllocationWarning => ({
    type: 'cannot_reconcile',
    message:
      `Your annual bills (${formatAmount(annualBills)}) exceed your annual income (${formatAmount(annualIncome)}). ` +
      'Please review your recurring expenses.',
    amount: money(annualBills.amount - annualIncome.amount, annualBills.currency),
  }),
};

/**
 * Average amount to set aside from each paycheck so a bill is covered over a year.
 * @param bill - bill snapshot
 * @param paycheckFrequency - how often income arrives
 * @returns - per-paycheck and annual amounts
 */
export function calculatePaycheckAllocation(bill: BillInfo, paycheckFrequency: Frequency): PaycheckAllocation {
  const annualCents = toCents(bill.amount.amount) * occurrencesPerYear(bill.frequency);
  const perPaycheckCents = Math.round(annualCents / occurrencesPerYear(paycheckFrequency));
  return {
    bill,
    amountPerPaycheck: moneyFromCents(perPaycheckCents, bill.amount.currency),
    annualAmount: moneyFromCents(annualCents, bill.amount.currency),
  };
}

/**
 * Per-paycheck view of all bills with warnings about the configured income.
 * @param bills - bill snapshots
 * @param paycheckFrequency - how often income arrives
 * @param paycheckAmount - net paycheck, when known
 * @returns - allocations, totals and warnings
 */
export function calculateAllocationSummary(
  bills: readonly BillInfo[],
  paycheckFrequency: Frequency,
  paycheckAmount: Money | null = null,
): PaycheckAllocationSummary {
  const periods = occurrencesPerYear(paycheckFrequency);
  const currency = bills[0]?.amount.currency ?? paycheckAmount?.currency ?? DEFAULT_CURRENCY;
  const annualIncome = paycheckAmount ? moneyFromCents(toCents(paycheckAmount.amount) * periods, currency) : null;

  if (bills.length === 0) {
    return {
      allocations: [],
      totalPerPaycheck: money(0, currency),
      totalAnnualBills: money(0, currency),
      paycheckFrequency,
      paycheckAmount,
      annualIncome,
      remainingPerPaycheck: paycheckAmount,
      warnings: [warnings.noBillsConfigured()],
    };
  }

  const allocations = bills.map((bill) => calculatePaycheckAllocation(bill, paycheckFrequency));
  const totalPerPaycheckCents = allocations.reduce((sum, entry) => sum + toCents(entry.amountPerPaycheck.amount), 0);
  const totalAnnualCents = allocations.reduce((sum, entry) => sum + toCents(entry.annualAmount.amount), 0);
  const totalPerPaycheck = moneyFromCents(totalPerPaycheckCents, currency);
  const totalAnnualBills = moneyFromCents(totalAnnualCents, currency);

  const found: AllocationWarning[] = [];
  let remainingPerPaycheck: Money | null = null;

  if (paycheckAmount && annualIncome) {
    const paycheckCents = toCents(paycheckAmount.amount);
    if (totalAnnualCents > toCents(annualIncome.amount)) {
      found.push(warnings.cannotReconcile(totalAnnualBills, annualIncome));
    }
    if (totalPerPaycheckCents > paycheckCents) {
      found.push(warnings.insufficientIncome(moneyFromCents(totalPerPaycheckCents - paycheckCents, currency)));
    }
    remainingPerPaycheck = moneyFromCents(paycheckCents - totalPerPaycheckCents, currency);
  } else {
    found.push(warnings.noIncomeConfigured());
  }

  return {
    allocations,
    totalPerPaycheck,
    totalAnnualBills,
    paycheckFrequency,
    paycheckAmount,
    annualIncome,
    remainingPerPaycheck,
    warnings: found,
  };
}
