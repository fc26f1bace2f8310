import type { TierAttempt, TierFailure, TierName } from "../lib/errors.js";

export type FetchFn = (input: string, init?: Parameters<typeof fetch>[1]) => Promise<Response>;

/** A single timed caption segment. Times are in seconds. */
export type TranscriptSegment = {
  text: string;
  start: number;
  duration: number;
};

/** A stored transcript row; the newest row per video is the current one. */
export type TranscriptRecord = {
  id: number;
  videoId: string;
  title: string;
  channel: string;
  /** Segment texts joined with newlines. */
  text: string;
  language: string | null;
  extractionDate: string; // ISO-8601, UTC
};

export type CallOptions = {
  /** Upper bound for the network call or subprocess behind one tier. */
  timeoutMs?: number;
};

export type CaptionResult =
  | { ok: true; segments: TranscriptSegment[]; language: string }
  | { ok: false; failure: TierFailure };

/** Primary captions API: direct fetch plus its track-listing interface. */
export interface CaptionSource {
  fetchPreferred(videoId: string, languages: string[], opts?: CallOptions): Promise<CaptionResult>;
  listAndFetchAny(videoId: string, languages: string[], opts?: CallOptions): Promise<CaptionResult>;
}

export type SubtitleDownload =
  | {
      ok: true;
      raw: string;
      language: string;
      format: string;
      /** Title and channel the tool reported while listing tracks. */
      metadata?: VideoMetadata;
    }
  | { ok: false; failure: TierFailure };

/** External download tool used as the last-resort tier. */
export interface SubtitleTool {
  downloadSubtitles(
    videoId: string,
    languages: string[],
    opts?: CallOptions,
  ): Promise<SubtitleDownload>;
}

export type VideoMetadata = {
  title?: string;
  channel?: string;
};

export interface MetadataLookup {
  lookupTitleAndChannel(videoId: string): Promise<VideoMetadata>;
}

export type AcquisitionState =
  | "try_preferred"
  | "try_listing"
  | "try_fallback_tool"
  | "parse"
  | "success"
  | "failed";

export type AcquiredTranscript = {
  segments: TranscriptSegment[];
  language: string;
  tier: TierName;
  attempts: TierAttempt[];
  metadata?: VideoMetadata;
};
