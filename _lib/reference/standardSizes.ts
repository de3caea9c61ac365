import { InvalidInputError } from "../errors";

export type StandardSizeResolution =
  | { readonly status: "standard"; readonly diameter: number }
  | {
      readonly status: "undersized";
      readonly diameter: number;
      readonly required: number;
    };

/**
 * Rounds a required diameter up to the next stock size.
 *
 * @param requiredDiameter Minimum diameter in m (null when not computable)
 * @param sizes Strictly ascending stock diameters in mm
 * @returns Chosen size in mm, or null when there is nothing to resolve.
 * When no stock size is large enough the largest one comes back tagged
 * `undersized` so callers cannot mistake it for a safe answer.
 */
export function roundToStandard(
  requiredDiameter: number | null | undefined,
  sizes: readonly number[],
): StandardSizeResolution | null {
  if (
    requiredDiameter === null ||
    requiredDiameter === undefined ||
    !Number.isFinite(requiredDiameter) ||
    requiredDiameter <= 0
  ) {
    return null;
  }
  if (sizes.length === 0) {
    throw new InvalidInputError("standard sizes", "Standard size table is empty.");
  }
  for (let i = 1; i < sizes.length; i++) {
    if (!(sizes[i] > sizes[i - 1])) {
      throw new InvalidInputError(
        "standard sizes",
        `Standard sizes must be strictly ascending. Received ${sizes[i - 1]} before ${sizes[i]}.`,
      );
    }
  }

  const requiredMm = requiredDiameter * 1000;

  // first index with sizes[i] >= requiredMm
  let lo = 0;
  let hi = sizes.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sizes[mid] >= requiredMm) hi = mid;
    else lo = mid + 1;
  }

  if (lo === sizes.length) {
    return Object.freeze({
      status: "undersized",
      diameter: sizes[sizes.length - 1],
      required: requiredMm,
    });
  }
  return Object.freeze({ status: "standard", diameter: sizes[lo] });
}
