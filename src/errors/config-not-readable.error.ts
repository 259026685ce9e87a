import { Data } from "effect";

export class ConfigNotReadableError extends Data.TaggedError('ConfigNotReadable')<{
  readonly path: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}
