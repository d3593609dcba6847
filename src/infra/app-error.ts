export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class AttemptVersionConflictError extends AppError {
  constructor(
    public readonly key: string,
    public readonly expectedVersion: number,
  ) {
    super(409, "attempt_version_conflict", `Attempt '${key}' changed since version ${expectedVersion}.`);
    this.name = "AttemptVersionConflictError";
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
