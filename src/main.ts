#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Duration, Effect, Layer, Logger, LogLevel } from "effect"
import { App } from './app.js';
import { AppConfig, commandLineConfigProvider } from './config.js';
import { serviceLayers } from './layers.js';
import { ModelConfigLoader } from './model-config/types.js';
import { DayFileSource } from './meter-data/types.js';
import { ReportPrinter } from './report/index.js';

const isProd = process.env.NODE_ENV == 'production';

const program = Effect.gen(function*() {
  const baseDir = yield* AppConfig.baseDir;
  const configFile = yield* AppConfig.configFile;
  const maxIntervalMinutes = yield* AppConfig.maxIntervalMinutes;

  return yield* Effect.gen(function*() {
    const config = yield* (yield* ModelConfigLoader).load(configFile);

    const app = new App(
      config,
      yield* DayFileSource,
      { maxInterval: Duration.minutes(maxIntervalMinutes) },
    );

    const summary = yield* app.run();

    yield* new ReportPrinter().print(summary);
  }).pipe(
    Effect.provide(serviceLayers({ baseDir })),
  );
}).pipe(
  Effect.provide(NodeContext.layer),
  Effect.provide(Layer.setConfigProvider(commandLineConfigProvider(process.argv.slice(2)))),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
