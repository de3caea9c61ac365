export type LengthUnit = "m" | "cm" | "mm" | "ft" | "in";
export type ForceUnit = "kN" | "N" | "lb" | "kip";
export type MomentUnit = "kN*m" | "N*m" | "N*mm" | "lb*ft" | "lb*in";
export type PowerUnit = "kW" | "W" | "hp";
export type StressUnit = "MPa" | "kN/m^2" | "GPa" | "psi" | "ksi";
export type AngleUnit = "deg" | "rad";

// Base unit: m
export const LENGTH_UNITS: Record<LengthUnit, number> = {
  m: 1,
  cm: 0.01,
  mm: 0.001,
  ft: 0.3048,
  in: 0.0254,
};

// Base unit: N
export const FORCE_UNITS: Record<ForceUnit, number> = {
  kN: 1000,
  N: 1,
  lb: 4.4482216152605,
  kip: 4448.2216152605,
};

// Base unit: N*m
export const MOMENT_UNITS: Record<MomentUnit, number> = {
  "kN*m": 1000,
  "N*m": 1,
  "N*mm": 0.001,
  "lb*ft": 1.3558179483314,
  "lb*in": 0.1129848290276,
};

// Base unit: kW
export const POWER_UNITS: Record<PowerUnit, number> = {
  kW: 1,
  W: 0.001,
  hp: 0.745699872,
};

// Base unit: MPa
export const STRESS_UNITS: Record<StressUnit, number> = {
  MPa: 1,
  "kN/m^2": 0.001,
  GPa: 1000,
  psi: 0.006894757293168,
  ksi: 6.894757293168,
};

export const ANGLE_UNITS: Record<AngleUnit, number> = {
  deg: Math.PI / 180,
  rad: 1,
};

const convert = <U extends string>(
  table: Record<U, number>,
  value: number,
  from: U,
  to: U,
): number => (value * table[from]) / table[to];

export const convertLength = (
  value: number,
  from: LengthUnit,
  to: LengthUnit = "m",
): number => convert(LENGTH_UNITS, value, from, to);

export const convertForce = (
  value: number,
  from: ForceUnit,
  to: ForceUnit = "N",
): number => convert(FORCE_UNITS, value, from, to);

export const convertMoment = (
  value: number,
  from: MomentUnit,
  to: MomentUnit = "N*m",
): number => convert(MOMENT_UNITS, value, from, to);

export const convertPower = (
  value: number,
  from: PowerUnit,
  to: PowerUnit = "kW",
): number => convert(POWER_UNITS, value, from, to);

export const convertStress = (
  value: number,
  from: StressUnit,
  to: StressUnit = "MPa",
): number => convert(STRESS_UNITS, value, from, to);

export const convertAngle = (
  value: number,
  from: AngleUnit,
  to: AngleUnit = "rad",
): number => convert(ANGLE_UNITS, value, from, to);
