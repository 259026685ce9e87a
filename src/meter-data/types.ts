import { Context, Effect } from "effect";
import type { BaseDirectoryNotReadableError } from "../errors/base-directory-not-readable.error.js";
import type { DayFileRejectedError } from "../errors/day-file-rejected.error.js";

// Counter fields stay raw; blank or bad values are tolerated downstream.
export type MeterSample = {
  readonly timestamp: Date;
  readonly imported: string;
  readonly exported: string;
  readonly generated: string;
};

export type RowSkipReason = 'ColumnCountMismatch' | 'BadTimestamp';

export type ParsedRow =
  | { readonly _tag: 'Sample'; readonly line: number; readonly sample: MeterSample }
  | { readonly _tag: 'Skipped'; readonly line: number; readonly reason: RowSkipReason; readonly detail: string };

export type DayFile = {
  readonly rows: readonly ParsedRow[];
};

export class DayFileSource extends Context.Tag("DayFileSource")<
  DayFileSource,
  {
    readonly listDayFiles: (years: readonly (number | string)[]) => Effect.Effect<string[], BaseDirectoryNotReadableError>;
    readonly readDayFile: (file: string) => Effect.Effect<string, DayFileRejectedError>;
  }
>() {}

export type IDayFileSource = Context.Tag.Service<typeof DayFileSource>;
