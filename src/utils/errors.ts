export type ErrorCode =
  | "not-found"
  | "invalid-input"
  | "external-tool-failure"
  | "io-failure";

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super("not-found", message);
  }
}

export class ToolNotFoundError extends NotFoundError {
  constructor(
    public readonly tool: string,
    public readonly searched: string[],
  ) {
    super(
      `Could not find ${tool} executable (looked in: ${searched.join(", ") || "nowhere"})`,
    );
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("invalid-input", message);
  }
}

/**
 * Failure reported by ffmpeg or ffprobe. Carries whatever the process wrote
 * before it exited so callers can surface the diagnostics.
 */
export class ExternalToolError extends AppError {
  constructor(
    message: string,
    public readonly stdout: string = "",
    public readonly stderr: string = "",
  ) {
    super("external-tool-failure", message);
  }
}

export class FileSystemError extends AppError {
  constructor(message: string) {
    super("io-failure", message);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
