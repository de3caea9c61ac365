/**
 * Raised when a design input would make a formula undefined (non-positive
 * pulley diameter, belt ratio <= 1, Sy or factor of safety <= 0, ...).
 * `field` names the offending input so a form can highlight it.
 */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }
}
