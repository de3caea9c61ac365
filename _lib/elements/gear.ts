import { assertFinite, assertGreaterThan, assertInRange } from "../logic/assertions";

export const MAX_PRESSURE_ANGLE = Math.PI / 4;

/**
 * Gear whose mesh forces are derived from the shaft torque and its pitch
 * diameter.
 * @param position Distance from the left bearing (m)
 * @param pressureAngle Pressure angle (rad), 0 to 45 degrees
 * @param pitchDiameter Pitch diameter (m); 0 degrades to zero mesh forces
 */
export class PitchDiameterGear {
  readonly kind: "pitchDiameter" = "pitchDiameter";
  readonly position: number;
  readonly pressureAngle: number;
  readonly pitchDiameter: number;

  constructor(position: number, pressureAngle: number, pitchDiameter: number) {
    assertFinite("gear position", position);
    assertInRange("gear pressure angle", pressureAngle, 0, MAX_PRESSURE_ANGLE);
    assertGreaterThan("gear pitch diameter", pitchDiameter, 0, true);

    this.position = position;
    this.pressureAngle = pressureAngle;
    this.pitchDiameter = pitchDiameter;
    Object.freeze(this);
  }
}

/**
 * Gear with a known tangential mesh force (N). The radial component still
 * follows from the pressure angle.
 */
export class TangentialForceGear {
  readonly kind: "tangentialForce" = "tangentialForce";
  readonly position: number;
  readonly pressureAngle: number;
  readonly tangentialForce: number;

  constructor(position: number, pressureAngle: number, tangentialForce: number) {
    assertFinite("gear position", position);
    assertInRange("gear pressure angle", pressureAngle, 0, MAX_PRESSURE_ANGLE);
    assertFinite("gear tangential force", tangentialForce);

    this.position = position;
    this.pressureAngle = pressureAngle;
    this.tangentialForce = tangentialForce;
    Object.freeze(this);
  }
}

export type Gear = PitchDiameterGear | TangentialForceGear;
