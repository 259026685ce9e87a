import { Effect } from "effect";
import Papa from "papaparse";
import { DayFileRejectedError } from "../errors/day-file-rejected.error.js";
import type { DayFile, MeterSample, ParsedRow } from "./types.js";

export const COLUMN_HEADERS = {
  date: '#date',
  time: 'time',
  imported: 'IMP',
  exported: 'EXP',
  generated: 'GEN-T',
} as const;

type Column = keyof typeof COLUMN_HEADERS;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{1,2}):(\d{2})$/;

// "YYYY-MM-DD HH:MM" in local time.
export const parseTimestamp = (text: string): Date | null => {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute] = match.map(Number);
  if (hour > 23 || minute > 59) {
    return null;
  }

  const timestamp = new Date(year, month - 1, day, hour, minute);

  return timestamp.getMonth() === month - 1 && timestamp.getDate() === day
    ? timestamp
    : null;
};

const findColumns = (header: readonly string[]): Record<Column, number> | null => {
  const indexOf = (name: string) => header.indexOf(name);
  const dateIndex = indexOf(COLUMN_HEADERS.date);

  const columns: Record<Column, number> = {
    date: dateIndex === -1 ? indexOf('date') : dateIndex,
    time: indexOf(COLUMN_HEADERS.time),
    imported: indexOf(COLUMN_HEADERS.imported),
    exported: indexOf(COLUMN_HEADERS.exported),
    generated: indexOf(COLUMN_HEADERS.generated),
  };

  return Object.values(columns).includes(-1) ? null : columns;
};

const parseRow = (
  record: readonly string[],
  line: number,
  header: readonly string[],
  columns: Record<Column, number>,
): ParsedRow => {
  if (record.length < header.length) {
    return {
      _tag: 'Skipped',
      line,
      reason: 'ColumnCountMismatch',
      detail: `Mismatch in column count (${record.length} of ${header.length})`,
    };
  }

  const timestampText = `${record[columns.date]} ${record[columns.time]}`;
  const timestamp = parseTimestamp(timestampText);

  if (timestamp === null) {
    return {
      _tag: 'Skipped',
      line,
      reason: 'BadTimestamp',
      detail: `Cannot parse date (${timestampText})`,
    };
  }

  const sample: MeterSample = {
    timestamp,
    imported: record[columns.imported],
    exported: record[columns.exported],
    generated: record[columns.generated],
  };

  return { _tag: 'Sample', line, sample };
};

/**
 * Parses one day of meter readings. The first record is the header line,
 * e.g. `#date,time,EXP,IMP,GEN-T,...`; only the columns in
 * {@link COLUMN_HEADERS} are used.
 */
export const parseDayFile = (text: string): Effect.Effect<DayFile, DayFileRejectedError> => {
  const { data, errors } = Papa.parse<string[]>(text, {
    delimiter: ',',
    skipEmptyLines: true,
  });

  const quoteError = errors.find((err) => err.type === 'Quotes');
  if (quoteError) {
    return Effect.fail(new DayFileRejectedError({
      reason: 'Malformed',
      message: `${quoteError.message} (row ${quoteError.row ?? '?'})`,
    }));
  }

  if (data.length < 2) {
    return Effect.fail(new DayFileRejectedError({ reason: 'Empty', message: 'empty file' }));
  }

  const [header, ...records] = data;

  const columns = findColumns(header);
  if (columns === null) {
    return Effect.fail(new DayFileRejectedError({
      reason: 'MissingColumns',
      message: 'Not all required fields are present',
    }));
  }

  return Effect.succeed({
    rows: records.map((record, index) => parseRow(record, index + 1, header, columns)),
  });
};
