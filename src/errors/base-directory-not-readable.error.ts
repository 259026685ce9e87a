import { Data } from "effect";

export class BaseDirectoryNotReadableError extends Data.TaggedError('BaseDirectoryNotReadable')<{
  readonly directory: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}
