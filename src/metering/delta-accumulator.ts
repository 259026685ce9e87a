const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const parseReading = (raw: string): number => DECIMAL.test(raw) ? Number(raw) : Number.NaN;

/**
 * Turns a cumulative meter counter (kWh) into the energy used since the
 * previous reading.
 *
 * A `lastReading` of 0 means there is no baseline yet: the next reading only
 * re-bases the counter and yields a delta of 0. The same happens when the
 * counter goes backwards (meter reset).
 */
export class DeltaAccumulator {
  private last = 0;
  private delta = 0;

  public get value(): number {
    return this.delta;
  }

  public get lastReading(): number {
    return this.last;
  }

  /**
   * Blank, unparseable or zero fields leave the accumulator untouched, so
   * `value` keeps the delta of the previous reading.
   */
  public update(raw: string | number): void {
    const reading = typeof raw === 'number' ? raw : parseReading(raw);

    if (!Number.isFinite(reading) || reading === 0) {
      return;
    }

    this.updateValue(reading);
  }

  public updateValue(reading: number): void {
    if (this.last === 0 || reading < this.last) {
      this.last = reading;
    }

    this.delta = reading - this.last;
    this.last = reading;
  }

  public reset(): void {
    this.last = 0;
  }
}

export type MeterAccumulators = {
  readonly imported: DeltaAccumulator;
  readonly exported: DeltaAccumulator;
  readonly generated: DeltaAccumulator;
};

export const makeMeterAccumulators = (): MeterAccumulators => ({
  imported: new DeltaAccumulator(),
  exported: new DeltaAccumulator(),
  generated: new DeltaAccumulator(),
});

export const resetMeterAccumulators = (meters: MeterAccumulators): void => {
  meters.imported.reset();
  meters.exported.reset();
  meters.generated.reset();
};
