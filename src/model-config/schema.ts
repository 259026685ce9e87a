import { Schema } from "effect";
import { parsePeriodStart } from "../tariff/tariff-resolver.js";

export const BatteryParametersSchema = Schema.Struct({
  size: Schema.Number.pipe(Schema.positive()),
  recharge: Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(100)),
  discharge: Schema.Number.pipe(Schema.nonNegative()),
});

export const TariffPeriodSchema = Schema.Struct({
  start: Schema.String.pipe(
    Schema.filter((start) => parsePeriodStart(start) !== null, {
      message: () => 'start must be a YYYY-MM-DD date',
    }),
  ),
  daily: Schema.Number,
  kwh: Schema.Number,
  feed_in: Schema.Number,
});

export const SimulationOptionsSchema = Schema.Struct({
  overcharge: Schema.optionalWith(Schema.Literal('log', 'clamp'), { default: () => 'log' as const }),
  tariff_lookup: Schema.optionalWith(
    Schema.Literal('by-start-date', 'first-period'),
    { default: () => 'by-start-date' as const },
  ),
});

export const ModelConfigSchema = Schema.Struct({
  battery: BatteryParametersSchema,
  years: Schema.Array(Schema.Union(Schema.Int, Schema.String)),
  cost: Schema.NonEmptyArray(TariffPeriodSchema),
  simulation: Schema.optionalWith(SimulationOptionsSchema, {
    default: () => ({ overcharge: 'log' as const, tariff_lookup: 'by-start-date' as const }),
  }),
});

export type ModelConfig = Schema.Schema.Type<typeof ModelConfigSchema>;
