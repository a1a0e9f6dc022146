export class ImportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ImportError";
  }
}

/** Bad root path, unreadable credentials, invalid flag values. */
export class ConfigurationError extends ImportError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class MalformedMboxError extends ImportError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      `Cannot read mbox file ${filePath}: ${errorMessage(cause)}`,
      "MALFORMED_MBOX",
      cause,
    );
    this.name = "MalformedMboxError";
  }
}

export class UndecodableMessageError extends ImportError {
  constructor(message: string) {
    super(message, "UNDECODABLE_MESSAGE");
    this.name = "UndecodableMessageError";
  }
}

/** Credential-level failure that makes every remaining insert pointless. */
export class FatalImportError extends ImportError {
  constructor(message: string, cause?: unknown) {
    super(message, "FATAL", cause);
    this.name = "FatalImportError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
