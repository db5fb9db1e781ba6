export class AggregatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Thrown by the store when an article's link is already present. */
export class DuplicateLinkError extends AggregatorError {
  constructor(readonly link: string) {
    super(`Article with link '${link}' already exists`);
  }
}

export class InvalidDateError extends AggregatorError {
  constructor(readonly value: string) {
    super(
      `Invalid date format provided: ${value}. Required format is YYYY-MM-DD. Ignoring date filter.`,
    );
  }
}

export class ExportError extends AggregatorError {}

export class UnsupportedFormatError extends ExportError {
  constructor(readonly format: string) {
    super(`Unsupported export format '${format}'. Use one of: csv, excel, json.`);
  }
}

/** Connection or query failure. The cause is the driver's error. */
export class StoreAccessError extends AggregatorError {}

/** The environment names an unusable store. */
export class ConfigError extends AggregatorError {}
