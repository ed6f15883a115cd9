// Amounts are kept as decimals with two places; arithmetic happens in cents.

export function toCents(amount: number | string): number {
  return Math.round(Number(amount) * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function sumAmounts(amounts: Array<number | string>): number {
  return fromCents(amounts.reduce<number>((total, amount) => total + toCents(amount), 0));
}
