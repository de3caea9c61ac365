import materialRows from "../../data/materials.json";
import shaftSizeRows from "../../data/shaftSizes.json";
import type { Material } from "../elements/material";
import { InvalidInputError } from "../errors";
import { assertGreaterThan } from "../logic/assertions";

/**
 * Read-only lookup tables the designer works against. Any source (JSON
 * bundled with the package, a database, a form's own table) can sit
 * behind this interface.
 */
export interface ReferenceDataSource {
  listMaterials(): readonly Material[];
  findMaterial(name: string): Material | undefined;
  /** Stock diameters in mm, ascending. */
  standardSizes(): readonly number[];
}

export type ReferenceTables = {
  materials: readonly Material[];
  standardSizes: readonly number[];
};

const normalizeName = (name: string) => name.trim().toLowerCase();

export function createReferenceData(tables: ReferenceTables): ReferenceDataSource {
  const byName = new Map<string, Material>();
  for (const row of tables.materials) {
    const name = row.name.trim();
    if (!name) {
      throw new InvalidInputError("material name", "Material name must not be empty.");
    }
    assertGreaterThan(`yield strength of ${name}`, row.yieldStrength, 0);
    const key = normalizeName(name);
    if (byName.has(key)) {
      throw new InvalidInputError("material name", `Duplicate material '${name}'.`);
    }
    byName.set(key, Object.freeze({ name, yieldStrength: row.yieldStrength }));
  }

  for (const size of tables.standardSizes) {
    assertGreaterThan("standard size", size, 0);
  }
  const sizes = Object.freeze(
    Array.from(new Set(tables.standardSizes)).sort((a, b) => a - b),
  );
  const materials = Object.freeze(Array.from(byName.values()));

  return {
    listMaterials: () => materials,
    findMaterial: (name) => byName.get(normalizeName(name)),
    standardSizes: () => sizes,
  };
}

export function requireMaterial(
  source: ReferenceDataSource,
  name: string,
): Material {
  const material = source.findMaterial(name);
  if (!material) {
    throw new InvalidInputError("material", `Unknown material '${name}'.`);
  }
  return material;
}

export const defaultReferenceData: ReferenceDataSource = createReferenceData({
  materials: materialRows,
  standardSizes: shaftSizeRows,
});
