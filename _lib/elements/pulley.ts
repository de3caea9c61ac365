import { assertFinite, assertGreaterThan } from "../logic/assertions";

/**
 * Belt pulley keyed to the shaft.
 * @param position Distance from the left bearing (m)
 * @param pitchDiameter Pitch diameter (m)
 * @param tensionRatio Tight side over slack side belt tension, T1/T2
 */
export class Pulley {
  readonly position: number;
  readonly pitchDiameter: number;
  readonly tensionRatio: number;

  constructor(position: number, pitchDiameter: number, tensionRatio: number) {
    assertFinite("pulley position", position);
    assertGreaterThan("pulley pitch diameter", pitchDiameter, 0);
    assertGreaterThan("pulley tension ratio", tensionRatio, 1);

    this.position = position;
    this.pitchDiameter = pitchDiameter;
    this.tensionRatio = tensionRatio;
    Object.freeze(this);
  }
}
