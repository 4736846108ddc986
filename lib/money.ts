import { DEFAULT_CURRENCY, type Money } from '@/models/obligation';

/**
 * Round to cents. Applied only where amounts enter the engine.
 */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Build a money value, normalising the currency code and rounding the amount.
 * @param amount - decimal amount
 * @param currency - ISO 4217 code
 * @returns - money value
 */
export function money(amount: number, currency: string = DEFAULT_CURRENCY): Money {
  // +0 avoids a -0 leaking out of rounding.
  return { currency: currency.toUpperCase(), amount: roundCurrency(amount) + 0 };
}

export function moneyFromCents(cents: number, currency: string): Money {
  return money(fromCents(cents), currency);
}

export function absMoney(value: Money): Money {
  return money(Math.abs(value.amount), value.currency);
}

export function negateMoney(value: Money): Money {
  return money(-value.amount, value.currency);
}

export function formatMoney(value: Money, locale = 'en-US'): string {
  return new Intl.NumberFormat(locale, {
    style: 'currency',
    currency: value.currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(value.amount);
}
