import { makeMeterAccumulators, type MeterAccumulators } from "../metering/delta-accumulator.js";
import { initialChargeLevel } from "../battery/battery-model.js";
import type { BatteryParameters, OverchargePolicy } from "../battery/types.js";

export type ScenarioTotals = {
  costCents: number;
  importedKwh: number;
  exportedKwh: number;
};

export type Scenario = 'noSolar' | 'solar' | 'solarBattery';

export const SCENARIOS: readonly Scenario[] = ['noSolar', 'solar', 'solarBattery'];

/**
 * Everything carried from one sample to the next, for the whole run. It is
 * owned by the run loop and handed to each step function.
 */
export type RunningState = {
  lastTimestamp: Date | null;
  readonly meters: MeterAccumulators;
  chargeLevel: number; // kWh currently stored in the simulated battery
  daysProcessed: number;
  totalConsumptionKwh: number;
  totalChargeKwh: number; // drawn for charging, before efficiency loss
  totalDischargeKwh: number;
  overchargeEvents: number;
  skippedIntervals: number;
  readonly scenarios: Record<Scenario, ScenarioTotals>;
};

const emptyTotals = (): ScenarioTotals => ({
  costCents: 0,
  importedKwh: 0,
  exportedKwh: 0,
});

export const makeRunningState = (
  battery: BatteryParameters,
  policy: OverchargePolicy = 'log',
): RunningState => ({
  lastTimestamp: null,
  meters: makeMeterAccumulators(),
  chargeLevel: initialChargeLevel(battery, policy),
  daysProcessed: 0,
  totalConsumptionKwh: 0,
  totalChargeKwh: 0,
  totalDischargeKwh: 0,
  overchargeEvents: 0,
  skippedIntervals: 0,
  scenarios: {
    noSolar: emptyTotals(),
    solar: emptyTotals(),
    solarBattery: emptyTotals(),
  },
});
