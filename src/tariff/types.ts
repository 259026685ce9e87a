export type TariffPeriod = {
  readonly start: string; // YYYY-MM-DD, local date the period applies from
  readonly daily: number; // supply charge per day, cents
  readonly kwh: number; // import rate, cents per kWh
  readonly feed_in: number; // export credit, cents per kWh
};

export type TariffLookup = 'by-start-date' | 'first-period';

export type ResolvedTariff = {
  readonly index: number;
  readonly period: TariffPeriod;
};
