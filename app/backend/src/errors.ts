export class QrServiceError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request cannot be composed, e.g. its content is empty. */
export class InvalidRequestError extends QrServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 400, { cause });
  }
}

/** No valid image exists for the request; never degraded to a partial result. */
export class EncodingError extends QrServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}
