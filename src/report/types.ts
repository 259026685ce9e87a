import type { Effect } from "effect";
import type { SimulationSummary } from "../simulation/aggregator.js";

export type IReportPrinter = {
  print: (summary: SimulationSummary) => Effect.Effect<void>;
};
