import {
  DEFAULT_DESIGN_OPTIONS,
  type DesignOptions,
} from "@_lib/shaftDesign/ShaftDesigner";
import {
  ANGLE_UNITS,
  type AngleUnit,
  FORCE_UNITS,
  type ForceUnit,
  LENGTH_UNITS,
  type LengthUnit,
  MOMENT_UNITS,
  type MomentUnit,
  POWER_UNITS,
  type PowerUnit,
} from "./unitUtils";

export type InputUnitPreference = {
  length: LengthUnit;
  force: ForceUnit;
  bendingMoment: MomentUnit;
  torsionalMoment: MomentUnit;
  power: PowerUnit;
  angle: AngleUnit;
};

export type DesignSettings = {
  units: InputUnitPreference;
  design: DesignOptions;
};

// Form defaults: mm for geometry, kW for power, degrees for pressure angle.
export const DEFAULT_INPUT_UNITS: InputUnitPreference = {
  length: "mm",
  force: "N",
  bendingMoment: "N*mm",
  torsionalMoment: "N*m",
  power: "kW",
  angle: "deg",
};

export const DEFAULT_DESIGN_SETTINGS: DesignSettings = {
  units: DEFAULT_INPUT_UNITS,
  design: DEFAULT_DESIGN_OPTIONS,
};

export type DesignSettingsOverrides = {
  units?: Partial<Record<keyof InputUnitPreference, unknown>>;
  design?: Partial<Record<"shockBending" | "shockTorsion" | "diagramStep", unknown>>;
};

const pick = <T extends string>(
  maybe: unknown,
  allowed: Record<T, number>,
  fallback: T,
): T => {
  if (typeof maybe !== "string") return fallback;
  const key = Object.keys(allowed).find((k): k is T => k === maybe);
  return key ?? fallback;
};

const positive = (maybe: unknown, fallback: number): number =>
  typeof maybe === "number" && Number.isFinite(maybe) && maybe > 0
    ? maybe
    : fallback;

export const sanitizeDesignSettings = (
  value?: DesignSettingsOverrides,
): DesignSettings => {
  const units = value?.units;
  const design = value?.design;
  const defaults = DEFAULT_DESIGN_SETTINGS;

  return {
    units: {
      length: pick(units?.length, LENGTH_UNITS, defaults.units.length),
      force: pick(units?.force, FORCE_UNITS, defaults.units.force),
      bendingMoment: pick(
        units?.bendingMoment,
        MOMENT_UNITS,
        defaults.units.bendingMoment,
      ),
      torsionalMoment: pick(
        units?.torsionalMoment,
        MOMENT_UNITS,
        defaults.units.torsionalMoment,
      ),
      power: pick(units?.power, POWER_UNITS, defaults.units.power),
      angle: pick(units?.angle, ANGLE_UNITS, defaults.units.angle),
    },
    design: {
      shockBending: positive(design?.shockBending, defaults.design.shockBending),
      shockTorsion: positive(design?.shockTorsion, defaults.design.shockTorsion),
      diagramStep: positive(design?.diagramStep, defaults.design.diagramStep),
    },
  };
};
