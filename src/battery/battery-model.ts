import type { BatteryParameters, BatteryStepInput, BatteryStepResult, OverchargePolicy } from "./types.js";

const efficiencyFactor = (battery: BatteryParameters): number => battery.recharge / 100;

// The battery is assumed to start holding one hour of discharge.
export const initialChargeLevel = (
  battery: BatteryParameters,
  policy: OverchargePolicy = 'log',
): number => policy === 'clamp'
  ? Math.min(battery.discharge, battery.size)
  : battery.discharge;

/**
 * Runs one interval through the battery: discharge against the import first,
 * then charge from the export. Both legs share the same per-interval limit
 * (`discharge` kWh/h over the interval length).
 *
 * Charging is lossy: drawing `x` kWh stores `x * recharge / 100` kWh.
 */
export const stepBattery = (
  chargeLevel: number,
  battery: BatteryParameters,
  { importKwh, exportKwh, intervalHours }: BatteryStepInput,
  policy: OverchargePolicy = 'log',
): BatteryStepResult => {
  const capacity = battery.discharge * intervalHours;
  const efficiency = efficiencyFactor(battery);

  let level = chargeLevel;
  let dischargedKwh = 0;
  let gridImportKwh = importKwh;
  let chargeDrawKwh = 0;
  let feedInKwh = exportKwh;
  let overcharged = false;

  if (importKwh > 0) {
    const usable = Math.min(capacity, level);

    if (importKwh > usable) {
      dischargedKwh = usable;
      gridImportKwh = importKwh - usable;
    } else {
      dischargedKwh = importKwh;
      gridImportKwh = 0;
    }

    level -= dischargedKwh;
  }

  if (exportKwh > 0) {
    const headroom = (battery.size - level) / efficiency;
    const room = policy === 'clamp' ? Math.max(0, headroom) : headroom;
    const draw = Math.min(room, capacity);

    if (exportKwh > draw) {
      chargeDrawKwh = draw;
      feedInKwh = exportKwh - draw;
    } else {
      chargeDrawKwh = exportKwh;
      feedInKwh = 0;
    }

    level += chargeDrawKwh * efficiency;
    overcharged = level > battery.size;
  }

  if (policy === 'clamp') {
    level = Math.min(Math.max(level, 0), battery.size);
  }

  return {
    chargeLevel: level,
    dischargedKwh,
    gridImportKwh,
    chargeDrawKwh,
    feedInKwh,
    overcharged,
  };
};
