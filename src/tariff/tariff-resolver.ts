import type { ResolvedTariff, TariffLookup, TariffPeriod } from "./types.js";

const START_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Local midnight of the period start, or null when the date is not YYYY-MM-DD.
export const parsePeriodStart = (start: string): Date | null => {
  const match = START_DATE_PATTERN.exec(start);
  if (!match) {
    return null;
  }

  const [, year, month, day] = match.map(Number);
  const date = new Date(year, month - 1, day);

  return date.getMonth() === month - 1 && date.getDate() === day ? date : null;
};

export const resolveTariffPeriod = (
  periods: readonly [TariffPeriod, ...TariffPeriod[]],
  date: Date,
  lookup: TariffLookup = 'by-start-date',
): ResolvedTariff => {
  let resolved: ResolvedTariff = { index: 0, period: periods[0] };

  if (lookup === 'first-period') {
    return resolved;
  }

  let latestStart = -Infinity;

  periods.forEach((period, index) => {
    const start = parsePeriodStart(period.start);

    if (start === null || start.getTime() > date.getTime()) {
      return;
    }

    if (start.getTime() > latestStart) {
      latestStart = start.getTime();
      resolved = { index, period };
    }
  });

  return resolved;
};
