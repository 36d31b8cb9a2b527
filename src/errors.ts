/**
 * Error types raised while resolving and reconciling Prometheus state
 */

export class ReconcileError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Remote index document could not be retrieved */
export class FetchError extends ReconcileError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(`Failed to fetch ${url}: ${message}`, cause);
  }
}

/** Remote index document was retrieved but is not valid */
export class IndexParseError extends ReconcileError {
  constructor(
    readonly url: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Failed to parse ${url}: ${message}`, cause);
  }
}

export class CredentialsError extends ReconcileError {}

export class ObservatoriumConfigNotFoundError extends ReconcileError {
  constructor(
    readonly indexId: string,
    readonly observatoriumId?: string,
  ) {
    super(
      observatoriumId
        ? `No observatorium config found for ${observatoriumId}`
        : `No observatorium config found for ${indexId} / prometheus`,
    );
  }
}

export class UnknownAuthTypeError extends ReconcileError {
  constructor(
    readonly indexId: string,
    readonly authType: string,
  ) {
    super(`Unknown auth type ${authType} for index ${indexId}`);
  }
}

export class InvalidStorageQuantityError extends ReconcileError {
  constructor(readonly quantity: string) {
    super(`Invalid storage quantity "${quantity}"`);
  }
}

/**
 * Kubernetes API errors carry the HTTP status on `statusCode`.
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    error.statusCode === 404
  );
}
