export class ConfigurationError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues.length > 0 ? issues : [message];
  }
}

export class NotFittedError extends ConfigurationError {
  constructor(method: string) {
    super(`Normalizer must be fitted before transform (method "${method}").`);
    this.name = "NotFittedError";
  }
}

export class TableShapeError extends Error {
  column?: string;

  constructor(message: string, column?: string) {
    super(message);
    this.name = "TableShapeError";
    this.column = column;
  }
}
