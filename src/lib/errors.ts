export type TranscriptErrorCode =
  | "invalid_reference"
  | "source_disabled"
  | "source_unavailable"
  | "no_match_for_languages"
  | "malformed_track"
  | "unexpected"
  | "no_tracks_available"
  | "fallback_tool_unavailable"
  | "fallback_extraction_failed"
  | "no_captions_offered"
  | "empty_fallback_result"
  | "storage_error";

const TERMINAL_CODES = new Set<TranscriptErrorCode>(["source_disabled", "source_unavailable"]);

/** Terminal codes mean no later tier can possibly produce captions for the video. */
export const isTerminalFailure = (code: TranscriptErrorCode): boolean => TERMINAL_CODES.has(code);

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
};

export class TranscriptError extends Error {
  readonly code: TranscriptErrorCode;
  readonly retryable: boolean;

  constructor(
    code: TranscriptErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "TranscriptError";
    this.code = code;
    this.retryable = options.retryable ?? !isTerminalFailure(code);
  }
}

export class InvalidReferenceError extends TranscriptError {
  readonly reference: string;

  constructor(reference: string, message: string) {
    super("invalid_reference", message, { retryable: false });
    this.name = "InvalidReferenceError";
    this.reference = reference;
  }
}

export class StorageError extends TranscriptError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("storage_error", message, { retryable: false, cause: options.cause });
    this.name = "StorageError";
  }
}

export type TierName = "preferred" | "listing" | "fallback_tool";

/** One link in the attempt chain kept by the acquirer. */
export type TierAttempt = {
  tier: TierName;
  ok: boolean;
  code?: TranscriptErrorCode;
  message?: string;
};

/** Tier-local failure, returned (never thrown) by the source adapters. */
export type TierFailure = {
  code: TranscriptErrorCode;
  message: string;
  cause?: unknown;
};

export class TranscriptAcquisitionError extends TranscriptError {
  readonly videoId: string;
  readonly tier: TierName;
  readonly attempts: TierAttempt[];

  constructor(
    videoId: string,
    tier: TierName,
    failure: TierFailure,
    attempts: TierAttempt[],
    message: string,
  ) {
    super(failure.code, message, { cause: failure.cause ?? failure.message });
    this.name = "TranscriptAcquisitionError";
    this.videoId = videoId;
    this.tier = tier;
    this.attempts = attempts;
  }
}

export const tierFailure = (
  code: TranscriptErrorCode,
  message: string,
  cause?: unknown,
): TierFailure => (cause === undefined ? { code, message } : { code, message, cause });

/** The injected analyzer threw or returned a verdict that fails validation. */
export class AnalysisError extends Error {
  readonly videoId: string;

  constructor(videoId: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AnalysisError";
    this.videoId = videoId;
  }
}
