export type BatteryParameters = {
  readonly size: number; // usable capacity, kWh
  readonly recharge: number; // % of drawn energy that ends up stored
  readonly discharge: number; // kWh per hour, limits both directions
};

// 'log' keeps an overcharged level as is, 'clamp' holds it inside [0, size].
export type OverchargePolicy = 'log' | 'clamp';

export type BatteryStepInput = {
  readonly importKwh: number;
  readonly exportKwh: number;
  readonly intervalHours: number;
};

export type BatteryStepResult = {
  readonly chargeLevel: number;
  readonly dischargedKwh: number; // import served from the battery
  readonly gridImportKwh: number; // import still drawn from the grid
  readonly chargeDrawKwh: number; // export diverted into the battery
  readonly feedInKwh: number; // export still fed in
  readonly overcharged: boolean;
};
