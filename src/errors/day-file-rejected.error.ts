import { Data } from "effect";

export type DayFileRejectionReason =
  | 'Unreadable'
  | 'Empty'
  | 'MissingColumns'
  | 'Malformed';

export class DayFileRejectedError extends Data.TaggedError('DayFileRejected')<{
  readonly reason: DayFileRejectionReason;
  readonly message: string;
}> {}
