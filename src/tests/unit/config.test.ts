import { describe, it, expect } from "@effect/vitest";
import { ConfigProvider, Effect } from "effect";
import { AppConfig, commandLineConfigProvider, parseFlags } from "../../config.js";

describe('parseFlags', () => {
  it('should accept both separated and inline values', () => {
    const values = parseFlags(['--dir', '/data/meter', '--interval=15']);

    expect(Object.fromEntries(values)).toEqual({
      BATTERY_MODEL_DIR: '/data/meter',
      BATTERY_MODEL_MAX_INTERVAL: '15',
    });
  });

  it('should keep everything after the first equals sign', () => {
    const values = parseFlags(['--dir=/data/run=2']);

    expect(values.get('BATTERY_MODEL_DIR')).toBe('/data/run=2');
  });

  it('should ignore unknown flags and a trailing flag without a value', () => {
    const values = parseFlags(['--verbose', '--config']);

    expect(values.size).toBe(0);
  });
});

describe('AppConfig', () => {
  it.effect('should fall back to the defaults', () => Effect.gen(function* () {
    const config = yield* Effect.all(AppConfig).pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map())),
    );

    expect(config).toEqual({ baseDir: './csv', configFile: 'costs.yml', maxIntervalMinutes: 10 });
  }));

  it.effect('should read the command-line flags', () => Effect.gen(function* () {
    const config = yield* Effect.all(AppConfig).pipe(
      Effect.withConfigProvider(commandLineConfigProvider(['--config', 'tariffs.yml', '--interval', '30'])),
    );

    expect(config.configFile).toBe('tariffs.yml');
    expect(config.maxIntervalMinutes).toBe(30);
  }));

  it.effect('should reject a non-integer interval', () => Effect.gen(function* () {
    const result = yield* Effect.all(AppConfig).pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([['BATTERY_MODEL_MAX_INTERVAL', 'soon']]))),
      Effect.either,
    );

    expect(result._tag).toBe('Left');
  }));
});
