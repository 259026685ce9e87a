import { Duration } from "effect";

export const DEFAULT_MAX_INTERVAL = Duration.minutes(10);

export type IntervalClassification =
  | { readonly _tag: 'Initial' }
  | { readonly _tag: 'Valid'; readonly duration: Duration.Duration }
  | { readonly _tag: 'Gap'; readonly duration: Duration.Duration };

// An interval exactly as long as maxInterval is still usable.
export const classifyInterval = (
  previous: Date | null,
  current: Date,
  maxInterval: Duration.Duration = DEFAULT_MAX_INTERVAL,
): IntervalClassification => {
  if (previous === null) {
    return { _tag: 'Initial' };
  }

  const duration = Duration.millis(current.getTime() - previous.getTime());

  return Duration.greaterThan(duration, maxInterval)
    ? { _tag: 'Gap', duration }
    : { _tag: 'Valid', duration };
};

export const durationInHours = (duration: Duration.Duration): number =>
  Duration.toMillis(duration) / Duration.toMillis(Duration.hours(1));
