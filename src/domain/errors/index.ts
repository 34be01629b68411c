// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

export class InsufficientStockError extends DomainError {
  constructor(productId: string, requested: number, available: number) {
    super(
      `Insufficient stock for product '${productId}': requested ${requested}, available ${available}.`,
      'INSUFFICIENT_STOCK',
      409
    );
  }
}

export class InvalidQuantityError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_QUANTITY', 400);
  }
}

// setting a line to the quantity it already has is rejected
export class QuantityUnchangedError extends DomainError {
  constructor(productId: string, quantity: number) {
    super(
      `Quantity for product '${productId}' is already ${quantity}.`,
      'QUANTITY_UNCHANGED',
      409
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

// 500 - storage read/write failed, the caller must not assume the change was kept
export class PersistenceError extends DomainError {
  constructor(operation: string, target: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Failed to ${operation} '${target}'${reason}`,
      'PERSISTENCE_FAILURE',
      500
    );
  }
}
