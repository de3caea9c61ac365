import { describe, expect, it } from "vitest";
import { PitchDiameterGear, TangentialForceGear } from "../elements/gear";
import { Pulley } from "../elements/pulley";
import { ShaftSpec } from "../elements/shaft";
import type { ShaftSpecInput } from "../elements/shaft";
import { InvalidInputError } from "../errors";
import { defaultReferenceData } from "../reference/referenceData";
import { designShaft, ShaftDesigner } from "../shaftDesign/ShaftDesigner";

const SIZES = [10, 16, 20, 25, 30, 40];
const deg20 = (20 * Math.PI) / 180;

// 1 m shaft, one 200 mm gear at 200 mm, 15 kW at 960 rev/min, Sy 400 MPa, fos 2
const singleGear = (overrides: Partial<ShaftSpecInput> = {}) =>
  new ShaftSpec({
    length: 1,
    material: { name: "Test Steel", yieldStrength: 400 },
    factorOfSafety: 2,
    power: 15,
    rpm: 960,
    gears: [new PitchDiameterGear(0.2, deg20, 0.2)],
    ...overrides,
  });

describe("designShaft", () => {
  const result = designShaft(singleGear(), SIZES);

  it("derives torque, gear forces and the superposed moment", () => {
    expect(result.motorTorque).toBe(149.21875);
    expect(result.torque).toBe(149.21875);
    expect(result.tangentialForce).toBe(2984.375);
    expect(result.radialForce).toBeCloseTo(1086.2237, 4);
    expect(result.bendingMoment).toBe(596.875);
    expect(result.tightSideTension).toBe(0);
    expect(result.slackSideTension).toBe(0);
  });

  it("computes three positive candidate diameters", () => {
    expect(result.diameters.torsion).toBeCloseTo(0.0156047, 6);
    expect(result.diameters.bending).toBeCloseTo(0.0312093, 6);
    expect(result.diameters.combined).toBeCloseTo(0.0250224, 6);
  });

  it("rounds the combined diameter up to a stock size", () => {
    expect(result.ok).toBe(true);
    expect(result.standardSize).toEqual({ status: "standard", diameter: 30 });
    expect(30).toBeGreaterThanOrEqual((result.diameters.combined ?? Infinity) * 1000);
    expect(result.messages).toEqual([]);
  });

  it("exposes the sequences the renderer draws", () => {
    expect(result.pointLoads).toHaveLength(1);
    expect(result.pointLoads[0].force).toBe(2984.375);
    expect(result.momentContributions.map((c) => c.moment)).toEqual([596.875]);
    expect(result.torqueSegments).toEqual([{ position: 0, torque: 149.21875 }]);
  });

  it("draws the simply supported diagram at 1 mm resolution", () => {
    const { diagram } = result;
    expect(diagram.shear).toHaveLength(1001);
    expect(diagram.reactions.left).toBeCloseTo(2387.5, 6);
    expect(diagram.reactions.right).toBeCloseTo(596.875, 6);
    expect(diagram.peakMoment.x).toBe(0.2);
    expect(diagram.peakMoment.value).toBeCloseTo(477.5, 6);
    expect(result.diameters.peakMoment).toBeCloseTo(0.0289722, 6);
  });

  it("adds the extra torsional and bending moments", () => {
    const extra = designShaft(
      singleGear({ extraTorsionalMoment: 50, extraBendingMoment: 100 }),
      SIZES,
    );
    expect(extra.motorTorque).toBe(149.21875);
    expect(extra.torque).toBe(199.21875);
    expect(extra.bendingMoment).toBe(696.875);
    expect(extra.momentContributions.map((c) => c.source)).toEqual([
      "gear",
      "extra",
    ]);
  });

  it("flags an undersized stock size instead of passing it as safe", () => {
    const undersized = designShaft(singleGear(), [10, 20]);
    expect(undersized.ok).toBe(false);
    expect(undersized.standardSize).toMatchObject({
      status: "undersized",
      diameter: 20,
    });
    expect(undersized.messages).toEqual([
      "No standard size reaches the required 25.02 mm. Largest available size 20 mm may be undersized.",
    ]);
  });

  it("uses a known tangential force directly", () => {
    const forced = designShaft(
      singleGear({
        power: 0,
        rpm: 0,
        gears: [new TangentialForceGear(0.5, deg20, 1000)],
      }),
      SIZES,
    );
    expect(forced.motorTorque).toBe(0);
    expect(forced.tangentialForce).toBe(1000);
    expect(forced.radialForce).toBeCloseTo(363.97, 2);
    expect(forced.bendingMoment).toBe(500);
    expect(forced.diameters.torsion).toBe(0);
  });

  it("degrades to no load when the shaft does not turn", () => {
    const idle = designShaft(singleGear({ rpm: 0 }), SIZES);
    expect(idle.tangentialForce).toBe(0);
    expect(idle.bendingMoment).toBe(0);
    expect(idle.diameters.combined).toBe(0);
    expect(idle.standardSize).toBeNull();
    expect(idle.ok).toBe(false);
    expect(idle.messages).toEqual([
      "Combined diameter is not computable; no standard size was chosen.",
    ]);
  });

  it("adds belt tensions from each pulley", () => {
    const withPulley = designShaft(
      singleGear({ pulleys: [new Pulley(0.5, 0.3, 2)] }),
      SIZES,
    );
    expect(withPulley.slackSideTension).toBeCloseTo(994.7917, 4);
    expect(withPulley.tightSideTension).toBeCloseTo(1989.5833, 4);
    expect(withPulley.bendingMoment).toBeCloseTo(1094.2708, 4);
    expect(withPulley.pointLoads.map((l) => l.source)).toEqual(["gear", "pulley"]);
  });

  it("places the bearings where the options say", () => {
    const inset = designShaft(singleGear(), SIZES, {
      supports: { start: 0, end: 0.8 },
    });
    expect(inset.diagram.shear).toHaveLength(801);
    expect(inset.diagram.reactions.left).toBeCloseTo(2238.28125, 6);
    expect(inset.bendingMoment).toBe(596.875);
  });

  it("rejects a stock table that is out of order", () => {
    expect(() => designShaft(singleGear(), [40, 30, 25])).toThrow(
      InvalidInputError,
    );
  });

  it("freezes the nested parts of the result", () => {
    const { diagram, standardSize, torqueSegments } = designShaft(
      singleGear(),
      SIZES,
    );
    expect(Object.isFrozen(diagram)).toBe(true);
    expect(Object.isFrozen(diagram.reactions)).toBe(true);
    expect(Object.isFrozen(diagram.shear)).toBe(true);
    expect(Object.isFrozen(diagram.moment)).toBe(true);
    expect(Object.isFrozen(standardSize)).toBe(true);
    expect(Object.isFrozen(torqueSegments[0])).toBe(true);
  });

  it("returns equal results when called again", () => {
    const spec = singleGear({ pulleys: [new Pulley(0.5, 0.3, 2)] });
    expect(designShaft(spec, SIZES)).toEqual(designShaft(spec, SIZES));
  });
});

describe("ShaftDesigner", () => {
  it("rounds against the bundled stock sizes", () => {
    const designer = new ShaftDesigner(defaultReferenceData);
    const result = designer.design(singleGear());
    expect(result.standardSize).toEqual({ status: "standard", diameter: 28 });
  });

  it("applies shock factors from its options", () => {
    const designer = new ShaftDesigner(defaultReferenceData, {
      shockBending: 2,
      shockTorsion: 2,
    });
    const plain = designShaft(singleGear(), SIZES).diameters.combined ?? 0;
    const shocked = designer.design(singleGear()).diameters.combined ?? 0;
    expect(shocked).toBeCloseTo(plain * Math.cbrt(2), 9);
  });
});
