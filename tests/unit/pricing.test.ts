import { fromCents, lineTotal, sumAmounts, toCents } from '../../src/cart/pricing';

describe('pricing', () => {
  it('should round prices to whole cents', () => {
    expect(toCents(24.99)).toBe(2499);
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(fromCents(7497)).toBe(74.97);
  });

  it('should multiply in cents', () => {
    expect(lineTotal(24.99, 3)).toBe(74.97);
    expect(lineTotal(0.1, 3)).toBe(0.3);
  });

  it('should sum without float drift', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(sumAmounts([49.98, 9.5, 22.5])).toBe(81.98);
    expect(sumAmounts([])).toBe(0);
  });
});
