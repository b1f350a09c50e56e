/**
 * Raised for missing, non-numeric or inconsistent raw input. `field` is the
 * dotted path of the offending argument, e.g. "spans.L1_right_m".
 */
export class FlatSlabInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "FlatSlabInputError";
    this.field = field;
  }
}
