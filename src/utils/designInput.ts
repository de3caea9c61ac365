import { PitchDiameterGear, TangentialForceGear } from "@_lib/elements/gear";
import type { Gear } from "@_lib/elements/gear";
import { Pulley } from "@_lib/elements/pulley";
import { createShaftSpec, type ShaftSpec } from "@_lib/elements/shaft";
import {
  defaultReferenceData,
  requireMaterial,
  type ReferenceDataSource,
} from "@_lib/reference/referenceData";
import { DEFAULT_DESIGN_SETTINGS, type DesignSettings } from "./designPreferences";
import {
  convertAngle,
  convertForce,
  convertLength,
  convertMoment,
  convertPower,
} from "./unitUtils";

export type GearForm =
  | { mode: "diameter"; diameter: number; pressureAngle: number; position: number }
  | { mode: "force"; tangentialForce: number; pressureAngle: number; position: number };

export type PulleyForm = {
  diameter: number;
  tensionRatio: number;
  position: number;
};

/** Values as entered on the parameter form, in the settings' input units. */
export type ShaftDesignForm = {
  material: string;
  factorOfSafety: number;
  length: number;
  power: number;
  rpm: number;
  gears?: GearForm[];
  pulleys?: PulleyForm[];
  extraBendingMoment?: number;
  extraTorsionalMoment?: number;
};

/**
 * Converts form values into a validated ShaftSpec in core units
 * (m, kW, rad, N·m). The material is looked up by name.
 */
export const shaftSpecFromForm = (
  form: ShaftDesignForm,
  reference: ReferenceDataSource = defaultReferenceData,
  settings: DesignSettings = DEFAULT_DESIGN_SETTINGS,
): ShaftSpec => {
  const { units } = settings;
  const toMeters = (value: number) => convertLength(value, units.length, "m");
  const toRadians = (value: number) => convertAngle(value, units.angle, "rad");

  const gears: Gear[] = (form.gears ?? []).map((g) =>
    g.mode === "force"
      ? new TangentialForceGear(
          toMeters(g.position),
          toRadians(g.pressureAngle),
          convertForce(g.tangentialForce, units.force, "N"),
        )
      : new PitchDiameterGear(
          toMeters(g.position),
          toRadians(g.pressureAngle),
          toMeters(g.diameter),
        ),
  );

  const pulleys = (form.pulleys ?? []).map(
    (p) => new Pulley(toMeters(p.position), toMeters(p.diameter), p.tensionRatio),
  );

  return createShaftSpec({
    length: toMeters(form.length),
    material: requireMaterial(reference, form.material),
    factorOfSafety: form.factorOfSafety,
    power: convertPower(form.power, units.power, "kW"),
    rpm: form.rpm,
    gears,
    pulleys,
    extraBendingMoment: convertMoment(
      form.extraBendingMoment ?? 0,
      units.bendingMoment,
      "N*m",
    ),
    extraTorsionalMoment: convertMoment(
      form.extraTorsionalMoment ?? 0,
      units.torsionalMoment,
      "N*m",
    ),
  });
};
