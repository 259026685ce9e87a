import { Config as EffectConfig, ConfigProvider } from "effect";

export const AppConfig = {
  baseDir: EffectConfig.string("BATTERY_MODEL_DIR").pipe(
    EffectConfig.withDefault("./csv")
  ),
  configFile: EffectConfig.string("BATTERY_MODEL_CONFIG").pipe(
    EffectConfig.withDefault("costs.yml")
  ),
  maxIntervalMinutes: EffectConfig.integer("BATTERY_MODEL_MAX_INTERVAL").pipe(
    EffectConfig.withDefault(10)
  ),
};

const FLAGS: Record<string, string> = {
  '--dir': 'BATTERY_MODEL_DIR',
  '--config': 'BATTERY_MODEL_CONFIG',
  '--interval': 'BATTERY_MODEL_MAX_INTERVAL',
};

// Accepts both `--flag value` and `--flag=value`.
export const parseFlags = (argv: readonly string[]): Map<string, string> => {
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = FLAGS[flag];

    if (key === undefined) {
      continue;
    }

    if (eq !== -1) {
      values.set(key, arg.slice(eq + 1));
    } else if (i + 1 < argv.length) {
      values.set(key, argv[++i]);
    }
  }

  return values;
};

// Command-line flags take precedence over environment variables.
export const commandLineConfigProvider = (argv: readonly string[]) =>
  ConfigProvider.fromMap(parseFlags(argv)).pipe(
    ConfigProvider.orElse(() => ConfigProvider.fromEnv())
  );
