export type LoadSource = "gear" | "pulley";

// --- PointLoad Class ---
// Transverse force acting at a point on the shaft. `force` is the magnitude
// in the direction the element pushes the shaft (N).
export class PointLoad {
  readonly position: number;
  readonly force: number;
  readonly source: LoadSource;
  readonly name: "PointLoad" = "PointLoad";

  constructor(position: number, force: number, source: LoadSource) {
    this.position = position;
    this.force = force;
    this.source = source;
  }
}

// --- MomentContribution Class ---
export class MomentContribution {
  readonly position: number;
  readonly moment: number;
  readonly source: LoadSource | "extra";
  readonly name: "MomentContribution" = "MomentContribution";

  constructor(position: number, moment: number, source: LoadSource | "extra") {
    this.position = position;
    this.moment = moment;
    this.source = source;
  }
}
