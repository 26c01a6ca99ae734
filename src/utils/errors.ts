export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly kind?: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, kind?: string) {
    super(message, 400, kind);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden', kind?: string) {
    super(message, 403, kind);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', kind?: string) {
    super(message, 404, kind);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, kind?: string) {
    super(message, 409, kind);
  }
}

/**
 * An external tool (ffmpeg) ran but reported failure.
 */
export class BadGatewayError extends AppError {
  constructor(message: string, kind?: string) {
    super(message, 502, kind);
  }
}

/**
 * A feature that needs configuration it doesn't have.
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string, kind?: string) {
    super(message, 503, kind);
  }
}
