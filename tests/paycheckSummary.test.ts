import { describe, expect, it } from 'vitest';

import { createBillInfo } from '@/lib/allocation';
import { calculateAllocationSummary, calculatePaycheckAllocation } from '@/lib/paycheckSummary';

const rent = createBillInfo('Rent', { currency: 'USD', amount: -1800 }, 'monthly');
const streaming = createBillInfo('Streaming', { currency: 'USD', amount: -15.99 }, 'monthly');

describe('calculatePaycheckAllocation', () => {
  it('spreads the annual cost over the paychecks of a year', () => {
    expect(calculatePaycheckAllocation(rent, 'biweekly')).toEqual({
      bill: rent,
      amountPerPaycheck: { currency: 'USD', amount: 830.77 },
      annualAmount: { currency: 'USD', amount: 21600 },
    });
    expect(calculatePaycheckAllocation(streaming, 'biweekly').amountPerPaycheck).toEqual({
      currency: 'USD',
      amount: 7.38,
    });
  });

  it('keeps the bill amount when both frequencies match', () => {
    expect(calculatePaycheckAllocation(rent, 'monthly').amountPerPaycheck).toEqual({ currency: 'USD', amount: 1800 });
  });
});

describe('calculateAllocationSummary', () => {
  it('computes totals and the remainder of each paycheck', () => {
    const summary = calculateAllocationSummary([rent, streaming], 'biweekly', { currency: 'USD', amount: 2000 });

    expect(summary.totalPerPaycheck).toEqual({ currency: 'USD', amount: 838.15 });
    expect(summary.totalAnnualBills).toEqual({ currency: 'USD', amount: 21791.88 });
    expect(summary.annualIncome).toEqual({ currency: 'USD', amount: 52000 });
    expect(summary.remainingPerPaycheck).toEqual({ currency: 'USD', amount: 1161.85 });
    expect(summary.warnings).toEqual([]);
  });

  it('warns when income cannot cover the bills', () => {
    const summary = calculateAllocationSummary([rent, streaming], 'biweekly', { currency: 'USD', amount: 500 });

    expect(summary.warnings.map((warning) => warning.type)).toEqual(['cannot_reconcile', 'insufficient_income']);
    expect(summary.warnings[0].amount).toEqual({ currency: 'USD', amount: 8791.88 });
    expect(summary.warnings[1]).toEqual({
      type: 'insufficient_income',
      message: 'Your bills require more than your paycheck amount. Shortfall: USD 338.15 per paycheck.',
      amount: { currency: 'USD', amount: 338.15 },
    });
    expect(summary.remainingPerPaycheck).toEqual({ currency: 'USD', amount: -338.15 });
  });

  it('asks for a paycheck amount when none is given', () => {
    const summary = calculateAllocationSummary([rent], 'monthly');

    expect(summary.warnings.map((warning) => warning.type)).toEqual(['no_income_configured']);
    expect(summary.remainingPerPaycheck).toBeNull();
    expect(summary.annualIncome).toBeNull();
  });

  it('warns when no bills are configured', () => {
    const summary = calculateAllocationSummary([], 'monthly', { currency: 'USD', amount: 3000 });

    expect(summary.warnings.map((warning) => warning.type)).toEqual(['no_bills_configured']);
    expect(summary.totalPerPaycheck).toEqual({ currency: 'USD', amount: 0 });
    expect(summary.remainingPerPaycheck).toEqual({ currency: 'USD', amount: 3000 });
    expect(summary.annualIncome).toEqual({ currency: 'USD', amount: 36000 });
  });
});
