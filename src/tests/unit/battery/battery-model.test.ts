import { describe, it, expect } from "@effect/vitest";
import { initialChargeLevel, stepBattery } from "../../../battery/battery-model.js";
import type { BatteryParameters } from "../../../battery/types.js";

describe('stepBattery', () => {
  const battery: BatteryParameters = { size: 10, discharge: 5, recharge: 90 };

  it('should serve the whole import from a full battery', () => {
    const result = stepBattery(10, battery, { importKwh: 3, exportKwh: 0, intervalHours: 1 });

    expect(result.dischargedKwh).toBe(3);
    expect(result.gridImportKwh).toBe(0);
    expect(result.chargeLevel).toBe(7);
    expect(result.overcharged).toBe(false);
  });

  it('should cap the discharge at the rate limit for the interval', () => {
    const result = stepBattery(10, battery, { importKwh: 1, exportKwh: 0, intervalHours: 0.1 });

    expect(result.dischargedKwh).toBeCloseTo(0.5);
    expect(result.gridImportKwh).toBeCloseTo(0.5);
    expect(result.chargeLevel).toBeCloseTo(9.5);
  });

  it('should cap the discharge at the stored charge', () => {
    const result = stepBattery(2, battery, { importKwh: 3, exportKwh: 0, intervalHours: 1 });

    expect(result.dischargedKwh).toBe(2);
    expect(result.gridImportKwh).toBe(1);
    expect(result.chargeLevel).toBe(0);
  });

  it('should absorb the whole export into an empty battery', () => {
    const result = stepBattery(0, battery, { importKwh: 0, exportKwh: 4, intervalHours: 1 });

    expect(result.chargeDrawKwh).toBe(4);
    expect(result.feedInKwh).toBe(0);
    expect(result.chargeLevel).toBeCloseTo(3.6);
    expect(result.overcharged).toBe(false);
  });

  it('should store the efficiency-adjusted export while drawing the full export', () => {
    const before = 2;
    const exportKwh = 0.25;

    const result = stepBattery(before, battery, { importKwh: 0, exportKwh, intervalHours: 1 / 12 });

    expect(result.chargeDrawKwh).toBe(exportKwh);
    expect(result.chargeLevel).toBeCloseTo(before + exportKwh * 0.9, 10);
  });

  it('should feed in what exceeds the rate limit', () => {
    const result = stepBattery(0, battery, { importKwh: 0, exportKwh: 7, intervalHours: 1 });

    expect(result.chargeDrawKwh).toBe(5);
    expect(result.feedInKwh).toBe(2);
    expect(result.chargeLevel).toBeCloseTo(4.5);
  });

  it('should feed in what does not fit in the remaining room', () => {
    // room = (10 - 9.1) / 0.9 = 1 kWh drawn from the export
    const result = stepBattery(9.1, battery, { importKwh: 0, exportKwh: 3, intervalHours: 1 });

    expect(result.chargeDrawKwh).toBeCloseTo(1);
    expect(result.feedInKwh).toBeCloseTo(2);
    expect(result.chargeLevel).toBeCloseTo(10);
  });

  it('should run both legs in one interval', () => {
    const result = stepBattery(5, battery, { importKwh: 1, exportKwh: 1, intervalHours: 1 });

    expect(result.dischargedKwh).toBe(1);
    expect(result.chargeDrawKwh).toBe(1);
    expect(result.chargeLevel).toBeCloseTo(4.9);
  });

  it('should leave both residuals untouched when nothing flows', () => {
    expect(stepBattery(5, battery, { importKwh: 0, exportKwh: 0, intervalHours: 1 })).toEqual({
      chargeLevel: 5,
      dischargedKwh: 0,
      gridImportKwh: 0,
      chargeDrawKwh: 0,
      feedInKwh: 0,
      overcharged: false,
    });
  });

  it('should not report an overcharge for exports within the rate limit and room', () => {
    const exportKwh = 0.4;
    let level = 0;
    let steps = 0;

    while ((battery.size - level) / 0.9 >= exportKwh) {
      const result = stepBattery(level, battery, { importKwh: 0, exportKwh, intervalHours: 0.1 });
      expect(result.overcharged).toBe(false);
      expect(result.feedInKwh).toBe(0);
      level = result.chargeLevel;
      steps++;
    }

    expect(steps).toBe(27);
    expect(level).toBeLessThanOrEqual(battery.size);
  });

  describe('with a battery already above its size', () => {
    const small: BatteryParameters = { size: 2, discharge: 5, recharge: 100 };

    it('should let the negative room pull the level back with the log policy', () => {
      const result = stepBattery(3, small, { importKwh: 0, exportKwh: 1, intervalHours: 1 });

      expect(result.overcharged).toBe(false);
      expect(result.chargeDrawKwh).toBe(-1);
      expect(result.feedInKwh).toBe(2);
      expect(result.chargeLevel).toBe(2);
    });

    it('should clamp the level and draw nothing with the clamp policy', () => {
      const result = stepBattery(3, small, { importKwh: 0, exportKwh: 1, intervalHours: 1 }, 'clamp');

      expect(result.overcharged).toBe(true);
      expect(result.chargeDrawKwh).toBe(0);
      expect(result.feedInKwh).toBe(1);
      expect(result.chargeLevel).toBe(2);
    });
  });
});

describe('initialChargeLevel', () => {
  it('should start with one hour of discharge', () => {
    expect(initialChargeLevel({ size: 10, discharge: 5, recharge: 90 })).toBe(5);
  });

  it('should only clamp the seed with the clamp policy', () => {
    const battery: BatteryParameters = { size: 2, discharge: 5, recharge: 90 };

    expect(initialChargeLevel(battery)).toBe(5);
    expect(initialChargeLevel(battery, 'clamp')).toBe(2);
  });
});
