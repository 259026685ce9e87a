import { Effect } from "effect";
import { resolveTariffPeriod } from "../tariff/tariff-resolver.js";
import type { ModelConfig } from "../model-config/schema.js";
import type { RunningState, Scenario } from "./running-state.js";

const DAYS_PER_YEAR = 365.25;

export type ScenarioSummary = {
  readonly cost: number; // dollars
  readonly costPerYear: number;
  readonly importedKwh: number;
  readonly exportedKwh: number;
};

export type CostDifference = {
  readonly from: Scenario;
  readonly to: Scenario;
  readonly total: number;
  readonly perDay: number;
  readonly perYear: number;
};

export type SimulationSummary = {
  readonly daysProcessed: number;
  readonly years: number;
  readonly scenarios: Record<Scenario, ScenarioSummary>;
  readonly differences: readonly CostDifference[];
  readonly totalConsumptionKwh: number;
  readonly totalChargeKwh: number;
  readonly totalDischargeKwh: number;
  readonly overchargeEvents: number;
  readonly skippedIntervals: number;
};

const COMPARISONS: readonly (readonly [Scenario, Scenario])[] = [
  ['noSolar', 'solar'],
  ['noSolar', 'solarBattery'],
  ['solar', 'solarBattery'],
];

/**
 * Adds one day's supply charge to every scenario. `dayDate` picks the tariff
 * period; without it the first period applies.
 */
export const closeDay = (
  state: RunningState,
  config: ModelConfig,
  dayDate: Date | null,
) => Effect.gen(function* () {
  const { period } = dayDate === null
    ? { period: config.cost[0] }
    : resolveTariffPeriod(config.cost, dayDate, config.simulation.tariff_lookup);

  state.scenarios.noSolar.costCents += period.daily;
  state.scenarios.solar.costCents += period.daily;
  state.scenarios.solarBattery.costCents += period.daily;
  state.daysProcessed++;

  yield* Effect.logDebug('Closed day', {
    day: state.daysProcessed,
    period: period.start,
    chargeLevel: state.chargeLevel,
  });
});

const perUnit = (value: number, units: number) => units > 0 ? value / units : 0;

export const summarize = (state: RunningState): SimulationSummary => {
  const days = state.daysProcessed;
  const years = days / DAYS_PER_YEAR;

  const scenario = (name: Scenario): ScenarioSummary => {
    const totals = state.scenarios[name];
    const cost = totals.costCents / 100;

    return {
      cost,
      costPerYear: perUnit(cost, years),
      importedKwh: totals.importedKwh,
      exportedKwh: totals.exportedKwh,
    };
  };

  const scenarios: Record<Scenario, ScenarioSummary> = {
    noSolar: scenario('noSolar'),
    solar: scenario('solar'),
    solarBattery: scenario('solarBattery'),
  };

  const differences = COMPARISONS.map(([from, to]): CostDifference => {
    const total = scenarios[from].cost - scenarios[to].cost;

    return {
      from,
      to,
      total,
      perDay: perUnit(total, days),
      perYear: perUnit(total, years),
    };
  });

  return {
    daysProcessed: days,
    years,
    scenarios,
    differences,
    totalConsumptionKwh: state.totalConsumptionKwh,
    totalChargeKwh: state.totalChargeKwh,
    totalDischargeKwh: state.totalDischargeKwh,
    overchargeEvents: state.overchargeEvents,
    skippedIntervals: state.skippedIntervals,
  };
};
