import { Console, Effect } from "effect";
import type { IReportPrinter } from "./types.js";
import type { SimulationSummary } from "../simulation/aggregator.js";
import { SCENARIOS, type Scenario } from "../simulation/running-state.js";

const TITLES: Record<Scenario, string> = {
  noSolar: 'No solar',
  solar: 'Solar',
  solarBattery: 'Solar+battery',
};

const LABELS: Record<Scenario, string> = {
  noSolar: 'no-solar',
  solar: 'solar',
  solarBattery: 'solar+battery',
};

const dollars = (value: number) => `$${value.toFixed(2)}`;
const kwh = (value: number) => value.toFixed(0);

export const formatReport = (summary: SimulationSummary): string[] => [
  `Days: ${summary.daysProcessed}, years: ${summary.years.toFixed(1)}`,
  '              | Total cost |  Cost PA  |  Import  |  Export  |',
  ...SCENARIOS.map((name) => {
    const scenario = summary.scenarios[name];

    return `${TITLES[name].padEnd(14)}| ${dollars(scenario.cost).padStart(10)} | ${dollars(scenario.costPerYear).padStart(9)} | ${kwh(scenario.importedKwh).padStart(8)} | ${kwh(scenario.exportedKwh).padStart(8)} |`;
  }),
  `Total consumption: ${kwh(summary.totalConsumptionKwh)}kWh, battery charging ${kwh(summary.totalChargeKwh)}kWh, battery discharge ${kwh(summary.totalDischargeKwh)}kWh`,
  ...summary.differences.map((diff) =>
    `Between ${LABELS[diff.from]}/${LABELS[diff.to]}: total ${dollars(diff.total)}, per day: ${dollars(diff.perDay)}, per year: ${dollars(diff.perYear)}`
  ),
];

export class ReportPrinter implements IReportPrinter {

  public print(summary: SimulationSummary) {
    return Effect.forEach(formatReport(summary), (line) => Console.log(line), { discard: true });
  }
}
