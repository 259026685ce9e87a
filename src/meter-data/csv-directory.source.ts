import { Effect, Layer } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { DayFileSource } from "./types.js";
import { BaseDirectoryNotReadableError } from "../errors/base-directory-not-readable.error.js";
import { DayFileRejectedError } from "../errors/day-file-rejected.error.js";

/**
 * Day files live under `<baseDir>/<year>/`, one file per day, named so that
 * sorting the paths puts them in time order (e.g. `2023/2023-01-15.csv`).
 */
export const CsvDirectoryDayFileSourceLayer = (config: {
  readonly baseDir: string;
}) => Layer.effect(
  DayFileSource,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const listYear = (year: number | string) => {
      const directory = path.join(config.baseDir, String(year));

      return Effect.gen(function* () {
        const entries = yield* fs.readDirectory(directory, { recursive: true });
        const files: string[] = [];

        for (const entry of entries) {
          const file = path.join(directory, entry);
          const info = yield* fs.stat(file);

          if (info.type === 'File') {
            files.push(file);
          }
        }

        return files;
      }).pipe(
        Effect.mapError((cause) => new BaseDirectoryNotReadableError({
          directory,
          message: `${directory}: ${cause.message}`,
          cause,
        })),
      );
    };

    const listDayFiles = (years: readonly (number | string)[]) => Effect.gen(function* () {
      const files: string[] = [];

      for (const year of years) {
        files.push(...(yield* listYear(year)));
      }

      yield* Effect.logDebug('Discovered day files', { baseDir: config.baseDir, count: files.length });

      return files.sort();
    });

    const readDayFile = (file: string) => fs.readFileString(file).pipe(
      Effect.mapError((cause) => new DayFileRejectedError({
        reason: 'Unreadable',
        message: cause.message,
      })),
    );

    return {
      listDayFiles,
      readDayFile,
    };
  }),
);
