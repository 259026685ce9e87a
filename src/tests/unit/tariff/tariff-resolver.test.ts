import { describe, it, expect } from "@effect/vitest";
import { parsePeriodStart, resolveTariffPeriod } from "../../../tariff/tariff-resolver.js";
import type { TariffPeriod } from "../../../tariff/types.js";

describe('resolveTariffPeriod', () => {
  const periods: [TariffPeriod, ...TariffPeriod[]] = [
    { start: '2022-01-01', daily: 100, kwh: 25, feed_in: 5 },
    { start: '2023-07-01', daily: 110, kwh: 30, feed_in: 4 },
    { start: '2023-01-01', daily: 105, kwh: 28, feed_in: 6 },
  ];

  it('should pick the latest period starting on or before the date', () => {
    expect(resolveTariffPeriod(periods, new Date(2023, 2, 10, 12, 0)).index).toBe(2);
    expect(resolveTariffPeriod(periods, new Date(2023, 6, 1, 0, 0)).index).toBe(1);
    expect(resolveTariffPeriod(periods, new Date(2022, 11, 31, 23, 55)).index).toBe(0);
  });

  it('should fall back to the first period before any start date', () => {
    const resolved = resolveTariffPeriod(periods, new Date(2020, 5, 1));

    expect(resolved.index).toBe(0);
    expect(resolved.period.kwh).toBe(25);
  });

  it('should always use the first period in first-period mode', () => {
    expect(resolveTariffPeriod(periods, new Date(2023, 8, 1), 'first-period')).toEqual({
      index: 0,
      period: periods[0],
    });
  });
});

describe('parsePeriodStart', () => {
  it('should parse to local midnight', () => {
    expect(parsePeriodStart('2023-07-01')).toEqual(new Date(2023, 6, 1));
  });

  it.each(['2023-7-1', '2023-02-30', 'July 2023', ''])('should reject %j', (start) => {
    expect(parsePeriodStart(start)).toBeNull();
  });
});
