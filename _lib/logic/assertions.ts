import { InvalidInputError } from "../errors";

export function assertFinite(name: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(name, `${name} must be a finite number.`);
  }
}

export function assertGreaterThan(
  name: string,
  value: number,
  min: number,
  inclusive = false,
) {
  assertFinite(name, value);
  const pass = inclusive ? value >= min : value > min;
  if (!pass) {
    const op = inclusive ? ">=" : ">";
    throw new InvalidInputError(
      name,
      `${name} must be ${op} ${min}. Received ${value}.`,
    );
  }
}

/** Closed interval check, [min, max]. */
export function assertInRange(
  name: string,
  value: number,
  min: number,
  max: number,
) {
  assertFinite(name, value);
  if (value < min || value > max) {
    throw new InvalidInputError(
      name,
      `${name} must be between ${min} and ${max}. Received ${value}.`,
    );
  }
}
