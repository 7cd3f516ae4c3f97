export type DeployErrorCode =
  | "CONFIG_MALFORMED"
  | "APP_NOT_RESOLVED"
  | "MISSING_BUILD_DIRECTORY"
  | "INVALID_DIRECTORY"
  | "EMPTY_ARTIFACT"
  | "SERVICE_ERROR"
  | "UPLOAD_FAILED"
  | "OPERATOR_CANCELLED";

/** Base class for every condition that ends the invocation with a non-zero status. */
export class DeployError extends Error {
  readonly code: DeployErrorCode;

  constructor(code: DeployErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigMalformedError extends DeployError {
  constructor(readonly file: string, detail: string, options?: { cause?: unknown }) {
    super("CONFIG_MALFORMED", `Error parsing config file ${file}: ${detail}`, options);
  }
}

export class AppNotResolvedError extends DeployError {
  constructor(message: string) {
    super("APP_NOT_RESOLVED", message);
  }
}

export class MissingBuildDirectoryError extends DeployError {
  constructor(readonly appName: string) {
    super("MISSING_BUILD_DIRECTORY", `App '${appName}' has no build_directory configured`);
  }
}

export class InvalidDirectoryError extends DeployError {
  constructor(readonly directory: string) {
    super("INVALID_DIRECTORY", `'${directory}' is not a valid directory`);
  }
}

export class EmptyArtifactError extends DeployError {
  constructor(readonly directory: string, extensions: readonly string[]) {
    super("EMPTY_ARTIFACT", `No ${extensions.join("/")} files found in '${directory}'`);
  }
}

/** Wraps a failure reported by the remote deployment service. */
export class ServiceError extends DeployError {
  constructor(readonly operation: string, detail: string, options?: { cause?: unknown }) {
    super("SERVICE_ERROR", `Error during ${operation}: ${detail}`, options);
  }
}

export class UploadFailedError extends DeployError {
  constructor(readonly status: number | undefined, detail: string, options?: { cause?: unknown }) {
    super(
      "UPLOAD_FAILED",
      status === undefined ? `Error uploading file: ${detail}` : `Error uploading file: HTTP ${status} :: ${detail}`,
      options,
    );
  }
}

export class OperatorCancelledError extends DeployError {
  constructor() {
    super("OPERATOR_CANCELLED", "Cancelled by operator");
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
