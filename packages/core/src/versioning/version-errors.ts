/**
 * Versioning Domain Errors
 *
 * Thrown by the document store and service layer. Callers are expected to
 * abort the build on any of these; nothing is retried.
 */

export class VersioningError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class VersionFileNotFoundError extends VersioningError {
  constructor(
    readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Version file not found: ${filePath}`, options);
  }
}

export class MalformedVersionDataError extends VersioningError {
  constructor(
    readonly filePath: string,
    readonly details: string,
    options?: ErrorOptions
  ) {
    super(`Malformed version data in ${filePath}: ${details}`, options);
  }
}

export class VersionFileWriteError extends VersioningError {
  constructor(
    readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write version file: ${filePath}`, options);
  }
}

export class InvalidApiLevelError extends VersioningError {
  constructor(readonly value: number) {
    super(`API level must be a positive integer, got ${value}`);
  }
}
