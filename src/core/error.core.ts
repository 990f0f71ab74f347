/* -------------------------------------------------------------------------- */
/*                               HTTP responses                               */
/* -------------------------------------------------------------------------- */
export class ErrorResponse extends Error {
  constructor(
    public readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestErrorResponse extends ErrorResponse {
  constructor({ message = "Bad request" }: { message?: string } = {}) {
    super(400, message);
  }
}

export class NotFoundErrorResponse extends ErrorResponse {
  constructor({ message = "Not found" }: { message?: string } = {}) {
    super(404, message);
  }
}

export class InternalServerErrorResponse extends ErrorResponse {
  constructor({ message = "Internal server error" }: { message?: string } = {}) {
    super(500, message);
  }
}

/* -------------------------------------------------------------------------- */
/*                                Output errors                               */
/* -------------------------------------------------------------------------- */
export class OutputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required output setting missing or inconsistent. Raised at construction. */
export class ConfigurationError extends OutputError {}

export class OutputOpenError extends OutputError {
  constructor(
    public readonly destination: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to open output ${destination}`, options);
  }
}

export class OutputWriteError extends OutputError {
  constructor(
    public readonly destination: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to write output bytes to ${destination}`, options);
  }
}

/** The caller broke the delivery contract (ordering, metadata pairing). */
export class ContractViolationError extends OutputError {}
