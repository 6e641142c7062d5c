/** Money math in integer cents so 24.99 × 3 is 74.97, not 74.96999… */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function lineTotal(unitPrice: number, quantity: number): number {
  return fromCents(toCents(unitPrice) * quantity);
}

export function sumAmounts(amounts: number[]): number {
  return fromCents(amounts.reduce((acc, amount) => acc + toCents(amount), 0));
}
