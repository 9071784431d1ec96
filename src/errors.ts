// ABOUTME: Error types for the voice pipeline, auth flow and transport boundary.
// ABOUTME: Every runtime error carries a stable code that RPC responses expose to the UI.

/**
 * Error codes surfaced to clients in `error.data.code`.
 */
export const VoiceErrorCode = {
  DEVICE_UNAVAILABLE: "DEVICE_UNAVAILABLE",
  RECORDING_IN_PROGRESS: "RECORDING_IN_PROGRESS",
  CONVERSION_FAILED: "CONVERSION_FAILED",
  TRANSPORT_REJECTED: "TRANSPORT_REJECTED",
  TRANSPORT_UNAUTHENTICATED: "TRANSPORT_UNAUTHENTICATED",
  AUTH_STEP_FAILED: "AUTH_STEP_FAILED",
  ATTEMPT_IN_FLIGHT: "ATTEMPT_IN_FLIGHT",
  ATTEMPT_NOT_FOUND: "ATTEMPT_NOT_FOUND",
  NO_TARGET_CHAT: "NO_TARGET_CHAT",
  INVALID_SETTING: "INVALID_SETTING",
} as const;

export type VoiceErrorCodeType = (typeof VoiceErrorCode)[keyof typeof VoiceErrorCode];

/**
 * Base error class for runtime operations.
 */
export class VoiceError extends Error {
  readonly code: VoiceErrorCodeType;
  readonly recoverable: boolean;

  constructor(
    message: string,
    code: VoiceErrorCodeType,
    options?: { recoverable?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "VoiceError";
    this.code = code;
    this.recoverable = options?.recoverable ?? false;
  }
}

/**
 * The capture device could not be acquired. Fatal to the current take.
 */
export class DeviceUnavailableError extends VoiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, VoiceErrorCode.DEVICE_UNAVAILABLE, options);
    this.name = "DeviceUnavailableError";
  }
}

export class RecordingInProgressError extends VoiceError {
  constructor() {
    super("A recording is already in progress", VoiceErrorCode.RECORDING_IN_PROGRESS);
    this.name = "RecordingInProgressError";
  }
}

export type ConversionFailure =
  | "SOURCE_UNREADABLE"
  | "UNSUPPORTED_FORMAT"
  | "EMPTY_SOURCE"
  | "ENCODER_FAILED";

/**
 * Conversion failed. The raw artifact is still valid and can be sent as-is.
 */
export class ConversionError extends VoiceError {
  readonly failure: ConversionFailure;

  constructor(message: string, failure: ConversionFailure, options?: { cause?: unknown }) {
    super(message, VoiceErrorCode.CONVERSION_FAILED, { ...options, recoverable: true });
    this.name = "ConversionError";
    this.failure = failure;
  }
}

/**
 * The backend refused a request. `backendCode` is whatever the backend reported.
 */
export class TransportRejectedError extends VoiceError {
  readonly backendCode: number | null;

  constructor(message: string, backendCode: number | null = null, options?: { cause?: unknown }) {
    super(message, VoiceErrorCode.TRANSPORT_REJECTED, { ...options, recoverable: true });
    this.name = "TransportRejectedError";
    this.backendCode = backendCode;
  }
}

export class TransportUnauthenticatedError extends VoiceError {
  constructor(state: string) {
    super(`Messaging session is not ready (state: ${state})`, VoiceErrorCode.TRANSPORT_UNAUTHENTICATED);
    this.name = "TransportUnauthenticatedError";
  }
}

export class AuthStepFailedError extends VoiceError {
  readonly step: string;

  constructor(step: string, message: string, options?: { cause?: unknown }) {
    super(message, VoiceErrorCode.AUTH_STEP_FAILED, { ...options, recoverable: true });
    this.name = "AuthStepFailedError";
    this.step = step;
  }
}

export class AttemptInFlightError extends VoiceError {
  constructor(attemptId: string) {
    super(`Send attempt ${attemptId} is still in flight`, VoiceErrorCode.ATTEMPT_IN_FLIGHT);
    this.name = "AttemptInFlightError";
  }
}

export class AttemptNotFoundError extends VoiceError {
  constructor(attemptId: string) {
    super(`No failed send attempt with id ${attemptId}`, VoiceErrorCode.ATTEMPT_NOT_FOUND);
    this.name = "AttemptNotFoundError";
  }
}

export class NoTargetChatError extends VoiceError {
  constructor() {
    super("No target chat selected", VoiceErrorCode.NO_TARGET_CHAT);
    this.name = "NoTargetChatError";
  }
}

export class InvalidSettingError extends VoiceError {
  constructor(key: string, reason: string) {
    super(`Invalid value for setting "${key}": ${reason}`, VoiceErrorCode.INVALID_SETTING);
    this.name = "InvalidSettingError";
  }
}

/**
 * Extract a human-readable message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
