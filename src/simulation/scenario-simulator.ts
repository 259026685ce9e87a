import { Duration, Effect } from "effect";
import { classifyInterval, durationInHours } from "../metering/interval-validator.js";
import { resetMeterAccumulators } from "../metering/delta-accumulator.js";
import { resolveTariffPeriod } from "../tariff/tariff-resolver.js";
import { stepBattery } from "../battery/battery-model.js";
import type { BatteryStepResult } from "../battery/types.js";
import type { ResolvedTariff } from "../tariff/types.js";
import type { MeterSample } from "../meter-data/types.js";
import type { ModelConfig } from "../model-config/schema.js";
import type { RunningState } from "./running-state.js";

export type SimulationContext = {
  readonly config: ModelConfig;
  readonly maxInterval: Duration.Duration;
};

export type IntervalDeltas = {
  readonly importKwh: number;
  readonly exportKwh: number;
  readonly generationKwh: number;
};

export type SampleOutcome =
  | { readonly _tag: 'Initial' }
  | { readonly _tag: 'Gap'; readonly duration: Duration.Duration }
  | {
    readonly _tag: 'Simulated';
    readonly duration: Duration.Duration;
    readonly tariff: ResolvedTariff;
    readonly deltas: IntervalDeltas;
    readonly consumptionKwh: number;
    readonly battery: BatteryStepResult;
  };

/**
 * Feeds one sample through the accumulators and, when the interval since the
 * previous sample is usable, through all three scenarios.
 *
 * The counters are updated before the interval is checked; after a gap they
 * are reset so the following sample only re-bases them.
 */
export const applySample = (
  state: RunningState,
  sample: MeterSample,
  { config, maxInterval }: SimulationContext,
): Effect.Effect<SampleOutcome> => Effect.gen(function* () {
  const { meters } = state;

  meters.imported.update(sample.imported);
  meters.exported.update(sample.exported);
  meters.generated.update(sample.generated);

  const interval = classifyInterval(state.lastTimestamp, sample.timestamp, maxInterval);
  state.lastTimestamp = sample.timestamp;

  if (interval._tag === 'Initial') {
    return interval;
  }

  if (interval._tag === 'Gap') {
    yield* Effect.log(`Skipping interval of ${Duration.format(interval.duration)} before ${sample.timestamp.toString()}`);
    resetMeterAccumulators(meters);
    state.skippedIntervals++;

    return interval;
  }

  const deltas: IntervalDeltas = {
    importKwh: meters.imported.value,
    exportKwh: meters.exported.value,
    generationKwh: meters.generated.value,
  };
  const tariff = resolveTariffPeriod(config.cost, sample.timestamp, config.simulation.tariff_lookup);
  const { kwh, feed_in: feedIn } = tariff.period;

  const consumptionKwh = deltas.importKwh + deltas.generationKwh - deltas.exportKwh;
  state.totalConsumptionKwh += consumptionKwh;

  const { noSolar, solar, solarBattery } = state.scenarios;

  noSolar.importedKwh += consumptionKwh;
  noSolar.costCents += consumptionKwh * kwh;

  solar.importedKwh += deltas.importKwh;
  solar.exportedKwh += deltas.exportKwh;
  solar.costCents += deltas.importKwh * kwh - deltas.exportKwh * feedIn;

  const battery = stepBattery(
    state.chargeLevel,
    config.battery,
    {
      importKwh: deltas.importKwh,
      exportKwh: deltas.exportKwh,
      intervalHours: durationInHours(interval.duration),
    },
    config.simulation.overcharge,
  );

  state.chargeLevel = battery.chargeLevel;
  state.totalDischargeKwh += battery.dischargedKwh;
  state.totalChargeKwh += battery.chargeDrawKwh;

  solarBattery.importedKwh += battery.gridImportKwh;
  solarBattery.exportedKwh += battery.feedInKwh;
  solarBattery.costCents += battery.gridImportKwh * kwh - battery.feedInKwh * feedIn;

  if (battery.overcharged) {
    state.overchargeEvents++;
    yield* Effect.logWarning('Overcharge!', {
      chargeLevel: battery.chargeLevel,
      size: config.battery.size,
      policy: config.simulation.overcharge,
      timestamp: sample.timestamp.toISOString(),
    });
  }

  const outcome: SampleOutcome = {
    _tag: 'Simulated',
    duration: interval.duration,
    tariff,
    deltas,
    consumptionKwh,
    battery,
  };

  return outcome;
});
