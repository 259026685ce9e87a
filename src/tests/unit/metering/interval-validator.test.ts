import { describe, it, expect } from "@effect/vitest";
import { Duration } from "effect";
import { classifyInterval, durationInHours } from "../../../metering/interval-validator.js";

describe('classifyInterval', () => {
  const at = (hour: number, minute: number) => new Date(2024, 0, 15, hour, minute);

  it('should treat the first sample as initial', () => {
    expect(classifyInterval(null, at(10, 0))).toEqual({ _tag: 'Initial' });
  });

  it('should accept intervals up to the maximum', () => {
    const result = classifyInterval(at(10, 0), at(10, 10), Duration.minutes(10));

    expect(result).toEqual({ _tag: 'Valid', duration: Duration.minutes(10) });
  });

  it('should report a gap for intervals longer than the maximum', () => {
    const result = classifyInterval(at(10, 0), at(10, 25), Duration.minutes(10));

    expect(result).toEqual({ _tag: 'Gap', duration: Duration.minutes(25) });
  });

  it('should default to a 10 minute maximum', () => {
    expect(classifyInterval(at(10, 0), at(10, 11))._tag).toBe('Gap');
    expect(classifyInterval(at(10, 0), at(10, 5))._tag).toBe('Valid');
  });
});

describe('durationInHours', () => {
  it('should convert durations to fractional hours', () => {
    expect(durationInHours(Duration.minutes(90))).toBe(1.5);
    expect(durationInHours(Duration.minutes(6))).toBeCloseTo(0.1);
  });
});
