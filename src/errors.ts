// --- Result type shared by every public operation of the core ---

export type Result<T, E extends Error = UERemoteError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// --- Error taxonomy ---

export type UERemoteErrorCode =
  | "NO_PORT_AVAILABLE"
  | "DISCOVERY_TIMEOUT"
  | "IDENTITY_MISMATCH"
  | "NOT_CONNECTED"
  | "TIMEOUT"
  | "REMOTE_EXECUTION_ERROR"
  | "CONNECTION_LOST"
  | "FRAMING_ERROR"
  | "PROCESS_LAUNCH_FAILED"
  | "BUILD_REQUIRED"
  | "LOG_NOT_FOUND"
  | "CONFIG_ERROR";

export abstract class UERemoteError extends Error {
  abstract readonly code: UERemoteErrorCode;
  /** Whether retrying the same call may succeed. */
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoPortAvailableError extends UERemoteError {
  readonly code = "NO_PORT_AVAILABLE";

  constructor(readonly start: number, readonly end: number) {
    super(`No available port in range ${start}-${end}`);
  }
}

export class DiscoveryTimeoutError extends UERemoteError {
  readonly code = "DISCOVERY_TIMEOUT";
  override readonly retryable = true;

  constructor(timeoutMs: number) {
    super(`No matching Unreal Editor instance discovered within ${timeoutMs}ms`);
  }
}

export class IdentityMismatchError extends UERemoteError {
  readonly code = "IDENTITY_MISMATCH";

  constructor(
    readonly expected: { nodeId?: string; pid?: number },
    readonly actual: { nodeId?: string; pid?: number | null },
  ) {
    super(
      expected.pid !== undefined
        ? `Editor process id mismatch: expected ${expected.pid}, got ${actual.pid ?? "unknown"}`
        : `Editor node mismatch: expected ${expected.nodeId}, got ${actual.nodeId ?? "unknown"}`,
    );
  }
}

export class NotConnectedError extends UERemoteError {
  readonly code = "NOT_CONNECTED";

  constructor(message = "Not connected to an Unreal Editor instance") {
    super(message);
  }
}

export class TimeoutError extends UERemoteError {
  readonly code = "TIMEOUT";
  override readonly retryable = true;

  constructor(what: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`);
  }
}

/**
 * The remote code raised. The channel reports this as a normal response with
 * `success=false`; tools turn that response into this error for the caller.
 */
export class RemoteExecutionError extends UERemoteError {
  readonly code = "REMOTE_EXECUTION_ERROR";
}

export class ConnectionLostError extends UERemoteError {
  readonly code = "CONNECTION_LOST";
  override readonly retryable = true;
}

export class FramingError extends UERemoteError {
  readonly code = "FRAMING_ERROR";
}

export class ProcessLaunchFailedError extends UERemoteError {
  readonly code = "PROCESS_LAUNCH_FAILED";

  constructor(message: string, readonly hint?: string) {
    super(hint ? `${message} (${hint})` : message);
  }
}

export class BuildRequiredError extends UERemoteError {
  readonly code = "BUILD_REQUIRED";

  constructor(readonly reason: string) {
    super(`Project needs to be built: ${reason}. Build the editor target before launching.`);
  }
}

export class LogNotFoundError extends UERemoteError {
  readonly code = "LOG_NOT_FOUND";
  override readonly retryable = true;
}

export class ConfigError extends UERemoteError {
  readonly code = "CONFIG_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system errors carry their errno name in `code`. */
export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
