import { InvalidInputError } from "../errors";

/**
 * Mechanics formulas for solid circular shafts.
 * Units: torque and moments in N·m, lengths in m, power in kW, speed in
 * rev/min, yield strength in MPa (N/mm²).
 */

/** 60 000 / 2π, rounded as in the usual handbook form T = 9550·P/n. */
export const POWER_TO_TORQUE = 9550;

const MPA_TO_PA = 1e6;

export type GearForces = { tangential: number; radial: number };
export type BeltTensions = { tight: number; slack: number };

/**
 * Shaft torque transmitted at a given power and speed.
 * A stationary shaft (rpm <= 0) transmits no torque.
 * @param power Power in kW
 * @param rpm Speed in rev/min
 */
export function torqueFromPower(power: number, rpm: number): number {
  if (rpm <= 0) return 0;
  return (POWER_TO_TORQUE * power) / rpm;
}

/**
 * Tangential and radial mesh forces of a spur gear.
 * Ft = 2T / r, Fr = Ft·tan(φ)
 * @param torque Shaft torque (N·m)
 * @param pitchDiameter Gear pitch diameter (m)
 * @param pressureAngle Pressure angle φ (rad)
 */
export function gearForces(
  torque: number,
  pitchDiameter: number,
  pressureAngle: number,
): GearForces {
  if (pitchDiameter <= 0) return { tangential: 0, radial: 0 };
  const radius = pitchDiameter / 2;
  const tangential = (2 * torque) / radius;
  return { tangential, radial: radialFromTangential(tangential, pressureAngle) };
}

export function radialFromTangential(
  tangential: number,
  pressureAngle: number,
): number {
  return tangential * Math.tan(pressureAngle);
}

/**
 * Tight (T1) and slack (T2) side belt tensions.
 * From T = (T1 - T2)·r and T1 = k·T2:  T2 = T / (r·(k - 1)), T1 = k·T2
 * @param torque Shaft torque (N·m)
 * @param pitchDiameter Pulley pitch diameter (m)
 * @param tensionRatio k = T1/T2, must be > 1
 */
export function pulleyTensions(
  torque: number,
  pitchDiameter: number,
  tensionRatio: number,
): BeltTensions {
  if (!(pitchDiameter > 0)) {
    throw new InvalidInputError(
      "pulley pitch diameter",
      `Pulley pitch diameter must be > 0. Received ${pitchDiameter}.`,
    );
  }
  if (!(tensionRatio > 1)) {
    throw new InvalidInputError(
      "pulley tension ratio",
      `Belt tension ratio must be > 1. Received ${tensionRatio}.`,
    );
  }

  const radius = pitchDiameter / 2;
  const slack = torque / (radius * (tensionRatio - 1));
  return { tight: tensionRatio * slack, slack };
}

/** Moment of a point load about the left reference end. */
export function pointLoadMoment(force: number, position: number): number {
  return force * position;
}

function allowableStress(yieldStrength: number, factorOfSafety: number) {
  if (yieldStrength <= 0 || factorOfSafety <= 0) return null;
  return (yieldStrength * MPA_TO_PA) / factorOfSafety;
}

/**
 * Minimum diameter (m) under pure torsion, τ = 16T / (πd³).
 * Returns null when Sy or fos is not positive.
 */
export function diameterFromTorsion(
  torque: number,
  yieldStrength: number,
  factorOfSafety: number,
): number | null {
  const tauAllow = allowableStress(yieldStrength, factorOfSafety);
  if (tauAllow === null) return null;
  return Math.cbrt((16 * Math.abs(torque)) / (Math.PI * tauAllow));
}

/**
 * Minimum diameter (m) under pure bending, σ = 32M / (πd³).
 * Returns null when Sy or fos is not positive.
 */
export function diameterFromBending(
  moment: number,
  yieldStrength: number,
  factorOfSafety: number,
): number | null {
  const sigmaAllow = allowableStress(yieldStrength, factorOfSafety);
  if (sigmaAllow === null) return null;
  return Math.cbrt((32 * Math.abs(moment)) / (Math.PI * sigmaAllow));
}

/**
 * ASME-style combined torsion and bending:
 * d = [ (16 / (π·τ)) · √((Kb·M)² + (Kt·T)²) ]^(1/3)
 * @param shockBending Kb, combined shock and fatigue factor on bending
 * @param shockTorsion Kt, combined shock and fatigue factor on torsion
 */
export function diameterFromCombined(
  moment: number,
  torque: number,
  yieldStrength: number,
  factorOfSafety: number,
  shockBending = 1,
  shockTorsion = 1,
): number | null {
  const tauAllow = allowableStress(yieldStrength, factorOfSafety);
  if (tauAllow === null) return null;
  const equivalent = Math.hypot(shockBending * moment, shockTorsion * torque);
  return Math.cbrt((16 / (Math.PI * tauAllow)) * equivalent);
}
