/**
 * Error model for the chart engine.
 * Only input validation can fail; every stage after it is total.
 */

export class InvalidChartError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid chart: ${issues.join("; ")}`);
    this.name = "InvalidChartError";
  }
}

export class CanonDataError extends Error {
  constructor(
    public readonly table: string,
    detail: string
  ) {
    super(`Canon table ${table} failed validation: ${detail}`);
    this.name = "CanonDataError";
  }
}
