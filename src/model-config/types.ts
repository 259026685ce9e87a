import { Context, Effect } from "effect";
import type { ModelConfig } from "./schema.js";
import type { ConfigNotReadableError } from "../errors/config-not-readable.error.js";
import type { ConfigInvalidError } from "../errors/config-invalid.error.js";

export class ModelConfigLoader extends Context.Tag("ModelConfigLoader")<
  ModelConfigLoader,
  {
    readonly load: (path: string) => Effect.Effect<ModelConfig, ConfigNotReadableError | ConfigInvalidError>;
  }
>() {}
