import { buildShaftDiagram } from "../diagram/shaftDiagram";
import type { ShaftDiagram, SupportSpan } from "../diagram/shaftDiagram";
import type { Gear } from "../elements/gear";
import { MomentContribution, PointLoad } from "../elements/load";
import type { ShaftSpec } from "../elements/shaft";
import {
  diameterFromBending,
  diameterFromCombined,
  diameterFromTorsion,
  gearForces,
  pulleyTensions,
  radialFromTangential,
  torqueFromPower,
} from "../logic/mechanics";
import type { GearForces } from "../logic/mechanics";
import { combineBendingMoments, momentContributions } from "../logic/superposition";
import type { ReferenceDataSource } from "../reference/referenceData";
import { roundToStandard } from "../reference/standardSizes";
import type { StandardSizeResolution } from "../reference/standardSizes";

export type DesignOptions = {
  /** Kb, shock and fatigue factor on bending. */
  shockBending: number;
  /** Kt, shock and fatigue factor on torsion. */
  shockTorsion: number;
  /** Diagram sampling step (m). */
  diagramStep: number;
  /** Bearing positions (m); the shaft ends when omitted. */
  supports?: SupportSpan;
};

export const DEFAULT_DESIGN_OPTIONS: DesignOptions = {
  shockBending: 1,
  shockTorsion: 1,
  diagramStep: 0.001,
};

export type TorqueSegment = { position: number; torque: number };

export type CandidateDiameters = {
  torsion: number | null;
  bending: number | null;
  combined: number | null;
  /** Bending-only diameter from the peak |M| of the moment diagram. */
  peakMoment: number | null;
};

export type DesignResult = {
  ok: boolean;
  motorTorque: number;
  torque: number;
  tangentialForce: number;
  radialForce: number;
  tightSideTension: number;
  slackSideTension: number;
  bendingMoment: number;
  diameters: CandidateDiameters;
  standardSize: StandardSizeResolution | null;
  pointLoads: readonly PointLoad[];
  momentContributions: readonly MomentContribution[];
  torqueSegments: readonly TorqueSegment[];
  diagram: ShaftDiagram;
  messages: readonly string[];
};

function resolveGearForces(gear: Gear, torque: number): GearForces {
  switch (gear.kind) {
    case "tangentialForce":
      return {
        tangential: gear.tangentialForce,
        radial: radialFromTangential(gear.tangentialForce, gear.pressureAngle),
      };
    case "pitchDiameter":
      return gearForces(torque, gear.pitchDiameter, gear.pressureAngle);
  }
}

function describeResolution(
  resolution: StandardSizeResolution | null,
): string | null {
  if (resolution === null) {
    return "Combined diameter is not computable; no standard size was chosen.";
  }
  if (resolution.status === "undersized") {
    return (
      `No standard size reaches the required ${resolution.required.toFixed(2)} mm. ` +
      `Largest available size ${resolution.diameter} mm may be undersized.`
    );
  }
  return null;
}

/**
 * Runs one design evaluation: torque, gear and pulley forces, superposed
 * bending moment, the three candidate diameters and the stock size.
 * Pure; nothing is kept between calls.
 *
 * @param sizes Stock diameters in mm, strictly ascending
 */
export function designShaft(
  spec: ShaftSpec,
  sizes: readonly number[],
  options: Partial<DesignOptions> = {},
): DesignResult {
  const opts: DesignOptions = { ...DEFAULT_DESIGN_OPTIONS, ...options };
  const Sy = spec.material.yieldStrength;
  const fos = spec.factorOfSafety;

  const motorTorque = torqueFromPower(spec.power, spec.rpm);

  const pointLoads: PointLoad[] = [];

  let tangentialForce = 0;
  let radialForce = 0;
  for (const gear of spec.gears) {
    const { tangential, radial } = resolveGearForces(gear, motorTorque);
    tangentialForce += tangential;
    radialForce += radial;
    pointLoads.push(new PointLoad(gear.position, tangential, "gear"));
  }

  let tightSideTension = 0;
  let slackSideTension = 0;
  for (const pulley of spec.pulleys) {
    const { tight, slack } = pulleyTensions(
      motorTorque,
      pulley.pitchDiameter,
      pulley.tensionRatio,
    );
    tightSideTension += tight;
    slackSideTension += slack;
    // belt pull on the shaft taken as the net transverse force T1 - T2
    pointLoads.push(new PointLoad(pulley.position, tight - slack, "pulley"));
  }

  const contributions = momentContributions(pointLoads);
  if (spec.extraBendingMoment !== 0) {
    contributions.push(
      new MomentContribution(0, spec.extraBendingMoment, "extra"),
    );
  }

  const bendingMoment = combineBendingMoments(contributions);
  const torque = motorTorque + spec.extraTorsionalMoment;

  const supports = opts.supports ?? { start: 0, end: spec.length };
  const diagram = buildShaftDiagram(spec.length, pointLoads, {
    step: Math.min(opts.diagramStep, supports.end - supports.start),
    supports,
  });

  const diameters: CandidateDiameters = {
    torsion: diameterFromTorsion(torque, Sy, fos),
    bending: diameterFromBending(bendingMoment, Sy, fos),
    combined: diameterFromCombined(
      bendingMoment,
      torque,
      Sy,
      fos,
      opts.shockBending,
      opts.shockTorsion,
    ),
    peakMoment: diameterFromBending(diagram.peakMoment.value, Sy, fos),
  };

  const standardSize = roundToStandard(diameters.combined, sizes);
  const message = describeResolution(standardSize);

  return Object.freeze({
    ok: standardSize?.status === "standard",
    motorTorque,
    torque,
    tangentialForce,
    radialForce,
    tightSideTension,
    slackSideTension,
    bendingMoment,
    diameters: Object.freeze(diameters),
    standardSize,
    pointLoads: Object.freeze(pointLoads),
    momentContributions: Object.freeze(contributions),
    torqueSegments: Object.freeze([Object.freeze({ position: 0, torque })]),
    diagram,
    messages: Object.freeze(message ? [message] : []),
  });
}

/** Designer bound to one reference data source and option set. */
export class ShaftDesigner {
  readonly reference: ReferenceDataSource;
  readonly options: DesignOptions;

  constructor(
    reference: ReferenceDataSource,
    options: Partial<DesignOptions> = {},
  ) {
    this.reference = reference;
    this.options = { ...DEFAULT_DESIGN_OPTIONS, ...options };
  }

  design(spec: ShaftSpec): DesignResult {
    return designShaft(spec, this.reference.standardSizes(), this.options);
  }
}
