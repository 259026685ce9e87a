import { Effect, Layer, ParseResult, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import YAML from "yaml";
import { ModelConfigSchema } from "./schema.js";
import { ModelConfigLoader } from "./types.js";
import { ConfigNotReadableError } from "../errors/config-not-readable.error.js";
import { ConfigInvalidError } from "../errors/config-invalid.error.js";

export const parseModelConfig = (path: string, text: string) =>
  Effect.try({
    try: (): unknown => YAML.parse(text),
    catch: (err) => new ConfigInvalidError({
      path,
      message: `Can't parse config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    }),
  }).pipe(
    Effect.flatMap((document) => Schema.decodeUnknown(ModelConfigSchema)(document)),
    Effect.catchTag('ParseError', (err) => Effect.fail(new ConfigInvalidError({
      path,
      message: `Can't parse config ${path}: ${ParseResult.TreeFormatter.formatErrorSync(err)}`,
    }))),
  );

export const YamlFileModelConfigLoaderLayer = Layer.effect(
  ModelConfigLoader,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const load = (path: string) => Effect.gen(function* () {
      const text = yield* fs.readFileString(path).pipe(
        Effect.mapError((cause) => new ConfigNotReadableError({
          path,
          message: `Can't read config ${path}: ${cause.message}`,
          cause,
        })),
      );

      const config = yield* parseModelConfig(path, text);

      yield* Effect.logDebug('Loaded model config', {
        path,
        years: config.years,
        periods: config.cost.length,
        simulation: config.simulation,
      });

      return config;
    });

    return { load };
  }),
);
