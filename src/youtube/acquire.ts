import {
  TranscriptAcquisitionError,
  isTerminalFailure,
  tierFailure,
  toErrorMessage,
  type TierAttempt,
  type TierFailure,
  type TierName,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { parseCues } from "./vtt.js";
import type {
  AcquiredTranscript,
  AcquisitionState,
  CallOptions,
  CaptionSource,
  SubtitleTool,
  TranscriptSegment,
  VideoMetadata,
} from "./types.js";

export type AcquisitionOutcome =
  | ({ ok: true } & AcquiredTranscript)
  | { ok: false; error: TranscriptAcquisitionError; attempts: TierAttempt[] };

export type TranscriptAcquirerDeps = {
  captions: CaptionSource;
  subtitleTool: SubtitleTool;
};

const TIER_LABELS: Record<TierName, string> = {
  preferred: "preferred captions",
  listing: "caption listing",
  fallback_tool: "yt-dlp subtitles",
};

/**
 * Drives the tiers in order (preferred captions, caption listing, yt-dlp subtitles),
 * stopping at the first success or at a terminal failure.
 */
export class TranscriptAcquirer {
  private readonly captions: CaptionSource;
  private readonly subtitleTool: SubtitleTool;

  constructor(deps: TranscriptAcquirerDeps) {
    this.captions = deps.captions;
    this.subtitleTool = deps.subtitleTool;
  }

  async acquire(
    videoId: string,
    languages: string[],
    opts?: CallOptions,
  ): Promise<AcquisitionOutcome> {
    const attempts: TierAttempt[] = [];
    const failures: { tier: TierName; failure: TierFailure }[] = [];
    let state: AcquisitionState = "try_preferred";
    let rawCues = "";
    let fallbackLanguage = "";
    let fallbackMetadata: VideoMetadata | undefined;
    let result:
      | { segments: TranscriptSegment[]; language: string; tier: TierName; metadata?: VideoMetadata }
      | undefined;

    const recordFailure = (tier: TierName, failure: TierFailure): void => {
      attempts.push({ tier, ok: false, code: failure.code, message: failure.message });
      failures.push({ tier, failure });
      logger.warn("Transcript tier failed", {
        context: "acquire",
        videoId,
        tier,
        code: failure.code,
        reason: failure.message,
      });
    };

    while (state !== "success" && state !== "failed") {
      switch (state) {
        case "try_preferred": {
          const res = await guard(() => this.captions.fetchPreferred(videoId, languages, opts));
          if (res.ok) {
            attempts.push({ tier: "preferred", ok: true });
            result = { segments: res.segments, language: res.language, tier: "preferred" };
            state = "success";
          } else {
            recordFailure("preferred", res.failure);
            state = isTerminalFailure(res.failure.code) ? "failed" : "try_listing";
          }
          break;
        }
        case "try_listing": {
          const res = await guard(() => this.captions.listAndFetchAny(videoId, languages, opts));
          if (res.ok) {
            attempts.push({ tier: "listing", ok: true });
            result = { segments: res.segments, language: res.language, tier: "listing" };
            state = "success";
          } else {
            recordFailure("listing", res.failure);
            state = "try_fallback_tool";
          }
          break;
        }
        case "try_fallback_tool": {
          const res = await guard(() =>
            this.subtitleTool.downloadSubtitles(videoId, languages, opts),
          );
          if (res.ok) {
            rawCues = res.raw;
            fallbackLanguage = res.language;
            fallbackMetadata = res.metadata;
            state = "parse";
          } else {
            recordFailure("fallback_tool", res.failure);
            state = "failed";
          }
          break;
        }
        case "parse": {
          const segments = parseCues(rawCues);
          if (segments.length > 0) {
            attempts.push({ tier: "fallback_tool", ok: true });
            result = {
              segments,
              language: fallbackLanguage,
              tier: "fallback_tool",
              ...(fallbackMetadata ? { metadata: fallbackMetadata } : {}),
            };
            state = "success";
          } else {
            recordFailure(
              "fallback_tool",
              tierFailure("empty_fallback_result", "Downloaded subtitles contained no parseable cues"),
            );
            state = "failed";
          }
          break;
        }
      }
    }

    if (result) {
      logger.info("Transcript acquired", {
        context: "acquire",
        videoId,
        tier: result.tier,
        language: result.language,
        segments: result.segments.length,
      });
      return { ok: true, ...result, attempts };
    }

    const error = buildError(videoId, failures, attempts);
    logger.error(error.message, { context: "acquire", videoId, code: error.code });
    return { ok: false, error, attempts };
  }
}

/** Adapters return tagged results; a stub or adapter that throws anyway is classified here. */
async function guard<T extends { ok: true } | { ok: false; failure: TierFailure }>(
  run: () => Promise<T>,
): Promise<T | { ok: false; failure: TierFailure }> {
  try {
    return await run();
  } catch (error) {
    return {
      ok: false,
      failure: tierFailure("unexpected", `Unexpected error: ${toErrorMessage(error)}`, error),
    };
  }
}

function buildError(
  videoId: string,
  failures: { tier: TierName; failure: TierFailure }[],
  attempts: TierAttempt[],
): TranscriptAcquisitionError {
  const last = failures[failures.length - 1];
  if (!last) {
    // unreachable: the machine only ends in "failed" after recording a failure
    return new TranscriptAcquisitionError(
      videoId,
      "preferred",
      tierFailure("unexpected", "Transcript acquisition ended without a result"),
      attempts,
      `Transcript acquisition for ${videoId} ended without a result`,
    );
  }

  if (isTerminalFailure(last.failure.code)) {
    return new TranscriptAcquisitionError(
      videoId,
      last.tier,
      last.failure,
      attempts,
      `No transcript for ${videoId}: ${last.failure.message}`,
    );
  }

  const tried = failures.map((f) => TIER_LABELS[f.tier]).join(", ");
  const causes = failures.map((f) => `${f.tier}: ${f.failure.message}`).join("; ");
  return new TranscriptAcquisitionError(
    videoId,
    last.tier,
    last.failure,
    attempts,
    `No transcript for ${videoId}: tried ${tried}; all failed: ${causes}`,
  );
}
