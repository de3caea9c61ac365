import type { DesignResult } from "@_lib/shaftDesign/ShaftDesigner";

const fmt = (value: number) => value.toFixed(2);
const mm = (diameter: number | null) =>
  diameter === null ? "not computable" : `${fmt(diameter * 1000)} mm`;

/** Plain-text summary of a design result, one line per entry. */
export const formatDesignReport = (result: DesignResult): string[] => {
  const lines = [
    `Torque: ${fmt(result.torque)} N·m`,
    `Total Tangential Force Ft: ${fmt(result.tangentialForce)} N`,
    `Total Radial Force Fr: ${fmt(result.radialForce)} N`,
    `Total Pulley Tension T1: ${fmt(result.tightSideTension)} N`,
    `Total Pulley Tension T2: ${fmt(result.slackSideTension)} N`,
    `Bending Moment: ${fmt(result.bendingMoment)} N·m`,
    `Reactions: RA = ${fmt(result.diagram.reactions.left)} N, RB = ${fmt(result.diagram.reactions.right)} N`,
    `Diameter from Torsion: ${mm(result.diameters.torsion)}`,
    `Diameter from Bending: ${mm(result.diameters.bending)}`,
    `Diameter from Combined: ${mm(result.diameters.combined)}`,
  ];

  const size = result.standardSize;
  if (size?.status === "standard") {
    lines.push(`Recommended Standard Shaft Diameter: ${size.diameter} mm`);
  } else if (size?.status === "undersized") {
    lines.push(`Best Available Shaft Diameter: ${size.diameter} mm (UNDERSIZED)`);
  }
  lines.push(...result.messages);

  return lines;
};
