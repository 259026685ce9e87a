import { Data } from "effect";

export class ConfigInvalidError extends Data.TaggedError('ConfigInvalid')<{
  readonly path: string;
  readonly message: string;
}> {}
