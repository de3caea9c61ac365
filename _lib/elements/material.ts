/** Reference row of the material table. Yield strength in MPa. */
export interface Material {
  readonly name: string;
  readonly yieldStrength: number;
}
