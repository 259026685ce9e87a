import { Duration, Effect } from 'effect';
import type { IDayFileSource, ParsedRow } from './meter-data/types.js';
import { parseDayFile } from './meter-data/day-file.parser.js';
import type { ModelConfig } from './model-config/schema.js';
import { makeRunningState, type RunningState } from './simulation/running-state.js';
import { applySample, type SimulationContext } from './simulation/scenario-simulator.js';
import { closeDay, summarize, type SimulationSummary } from './simulation/aggregator.js';
import { DEFAULT_MAX_INTERVAL } from './metering/interval-validator.js';
import type { BaseDirectoryNotReadableError } from './errors/base-directory-not-readable.error.js';

export type RunOptions = {
  maxInterval: Duration.Duration;
};

export class App {
  public constructor(
    private readonly config: ModelConfig,
    private readonly dayFileSource: IDayFileSource,
    private readonly runOptions: RunOptions = {
      maxInterval: DEFAULT_MAX_INTERVAL,
    },
  ) { }

  public run(): Effect.Effect<SimulationSummary, BaseDirectoryNotReadableError> {
    const deps = this;

    return Effect.gen(function*() {
      const files = yield* deps.dayFileSource.listDayFiles(deps.config.years);
      const state = makeRunningState(deps.config.battery, deps.config.simulation.overcharge);
      const context: SimulationContext = {
        config: deps.config,
        maxInterval: deps.runOptions.maxInterval,
      };

      yield* Effect.log(`Processing ${files.length} day files`, {
        maxInterval: Duration.format(context.maxInterval),
        initialChargeLevel: state.chargeLevel,
      });

      for (const file of files) {
        yield* deps.processDayFile(state, file, context).pipe(
          Effect.catchTag('DayFileRejected', (err) => Effect.logWarning(`${file}: ${err.message}`)),
          Effect.withSpan('processDayFile', { attributes: { file } }),
        );
      }

      return summarize(state);
    });
  }

  /**
   * Simulates every usable row of one file, then charges the day. A rejected
   * file leaves the running state untouched.
   */
  public processDayFile(state: RunningState, file: string, context: SimulationContext) {
    const deps = this;

    return Effect.gen(function*() {
      const text = yield* deps.dayFileSource.readDayFile(file);
      const { rows } = yield* parseDayFile(text);

      let dayDate: Date | null = null;

      for (const row of rows) {
        if (row._tag === 'Skipped') {
          yield* deps.logSkippedRow(file, row);
          continue;
        }

        dayDate ??= row.sample.timestamp;
        yield* applySample(state, row.sample, context);
      }

      yield* closeDay(state, deps.config, dayDate);
    });
  }

  private logSkippedRow(file: string, row: Extract<ParsedRow, { _tag: 'Skipped' }>) {
    return Effect.log(`${file}: ${row.line}: ${row.detail}`);
  }
}
