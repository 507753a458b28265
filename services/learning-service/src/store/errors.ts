import { AppError } from '@eduhub/shared/config/errorHandler';

export class DuplicateKeyError extends AppError {
  constructor(
    public readonly collection: string,
    public readonly keyFields: string[],
    public readonly keyValue: Record<string, unknown> = {}
  ) {
    super(`Duplicate key error in ${collection}: ${keyFields.join(', ')}`, 409);
  }

  /** True when the violated index is exactly the given field set */
  isOn(...fields: string[]): boolean {
    return fields.length === this.keyFields.length && fields.every((field) => this.keyFields.includes(field));
  }
}

export class SchemaValidationError extends AppError {
  constructor(
    public readonly collection: string,
    public readonly messages: string[]
  ) {
    super(`Document failed validation for ${collection}: ${messages.join('; ')}`, 400);
  }
}

export class DisplayIdCollisionError extends AppError {
  constructor(
    public readonly collection: string,
    public readonly prefix: string,
    public readonly attempts: number
  ) {
    super(`Could not allocate a unique ${prefix} id in ${collection} after ${attempts} attempts`, 409);
  }
}

export class UnsupportedOperatorError extends AppError {
  constructor(
    public readonly operator: string,
    detail?: string
  ) {
    super(detail ? `Invalid use of ${operator}: ${detail}` : `Unsupported operator: ${operator}`, 400);
  }
}
