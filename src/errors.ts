/**
 * Error classes raised while building grid expressions
 */

/**
 * Base error class for expression-building failures
 */
export class GridExpressionError extends Error {
  /** Name of the model being queried */
  public readonly modelName: string;

  constructor(message: string, modelName: string) {
    super(message);
    this.name = 'GridExpressionError';
    this.modelName = modelName;

    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace(this, GridExpressionError);
  }
}

/**
 * A column names an attribute the model does not have
 */
export class PropertyNotFoundError extends GridExpressionError {
  public readonly propertyName: string;

  constructor(propertyName: string, modelName: string) {
    super(`Cannot find a property with the name '${propertyName}' on model '${modelName}'`, modelName);
    this.name = 'PropertyNotFoundError';
    this.propertyName = propertyName;
  }
}

/**
 * No provider is registered for an attribute's declared type
 */
export class CreatorNotFoundError extends GridExpressionError {
  public readonly propertyName: string;
  public readonly typeName: string;

  constructor(typeName: string, propertyName: string, modelName: string) {
    super(
      `Cannot find an expression provider for type '${typeName}' (property '${propertyName}' on model '${modelName}')`,
      modelName
    );
    this.name = 'CreatorNotFoundError';
    this.propertyName = propertyName;
    this.typeName = typeName;
  }
}

/**
 * A provider refused to build a column filter
 *
 * Only raised for per-column filters. During a global search a declining
 * provider just leaves its column out.
 */
export class ProviderDeclinedError extends GridExpressionError {
  public readonly propertyName: string;
  public readonly value: string;

  constructor(propertyName: string, value: string, modelName: string) {
    super(
      `The expression provider for property '${propertyName}' on model '${modelName}' cannot filter by '${value}'`,
      modelName
    );
    this.name = 'ProviderDeclinedError';
    this.propertyName = propertyName;
    this.value = value;
  }
}

export function isGridExpressionError(error: unknown): error is GridExpressionError {
  return error instanceof GridExpressionError;
}
