import { z } from "zod";
import { tierFailure, toErrorMessage, type TierFailure } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { captionText } from "./entities.js";
import { isRecord, normalizeSegments } from "./normalize.js";
import type {
  CallOptions,
  CaptionResult,
  CaptionSource,
  FetchFn,
  TranscriptSegment,
} from "./types.js";

export type YouTubeCaptionSourceOptions = {
  fetchFn?: FetchFn;
  /** Default per-request timeout when the caller passes none. */
  timeoutMs?: number;
};

const BROWSER_UA =
  // desktop Chrome; the watch page omits the player response for unknown agents
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const DEFAULT_TIMEOUT_MS = 15_000;

const captionTrackSchema = z.object({
  baseUrl: z.string(),
  languageCode: z.string(),
  kind: z.string().optional(),
  vssId: z.string().optional(),
});

type CaptionTrack = z.infer<typeof captionTrackSchema>;

const playerResponseSchema = z.object({
  playabilityStatus: z
    .object({ status: z.string().optional(), reason: z.string().optional() })
    .optional(),
  captions: z
    .object({
      playerCaptionsTracklistRenderer: z
        .object({ captionTracks: z.array(z.unknown()).optional() })
        .optional(),
    })
    .optional(),
});

type PlayerResponse = z.infer<typeof playerResponseSchema>;

type TrackListing = { ok: true; tracks: CaptionTrack[] } | { ok: false; failure: TierFailure };

type TrackFetch = { ok: true; segments: TranscriptSegment[] } | { ok: false; failure: TierFailure };

/** Playability states meaning the video itself is gone, not merely hidden from this client. */
const UNAVAILABLE_STATUSES = new Set(["ERROR", "UNPLAYABLE"]);

/**
 * Caption source backed by the watch page's player response and the timedtext endpoint.
 *
 * Both operations return tagged results and never throw.
 */
export class YouTubeCaptionSource implements CaptionSource {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(opts: YouTubeCaptionSourceOptions = {}) {
    this.fetchFn = opts.fetchFn ?? globalThis.fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchPreferred(
    videoId: string,
    languages: string[],
    opts?: CallOptions,
  ): Promise<CaptionResult> {
    try {
      const listing = await this.listTracks(videoId, opts);
      if (!listing.ok) return listing;

      const track = findPreferredTrack(listing.tracks, languages);
      if (!track) {
        const available = listing.tracks.map((t) => t.languageCode).join(", ");
        return {
          ok: false,
          failure: tierFailure(
            "no_match_for_languages",
            `No captions for [${languages.join(", ")}]; available: [${available}]`,
          ),
        };
      }

      const fetched = await this.fetchTrack(track, opts);
      if (!fetched.ok) return fetched;
      return { ok: true, segments: fetched.segments, language: track.languageCode };
    } catch (error) {
      return { ok: false, failure: unexpected(error) };
    }
  }

  async listAndFetchAny(
    videoId: string,
    languages: string[],
    opts?: CallOptions,
  ): Promise<CaptionResult> {
    try {
      const listing = await this.listTracks(videoId, opts);
      if (!listing.ok) return listing;

      logger.info("Available caption tracks", {
        context: "captions",
        videoId,
        tracks: listing.tracks.map((t) => `${t.languageCode}${isGenerated(t) ? " (auto)" : ""}`),
      });

      let lastFailure: TierFailure | undefined;
      for (const track of rankTracks(listing.tracks, languages)) {
        const fetched = await this.fetchTrack(track, opts);
        if (fetched.ok) {
          logger.info("Using caption track", {
            context: "captions",
            videoId,
            language: track.languageCode,
            generated: isGenerated(track),
          });
          return { ok: true, segments: fetched.segments, language: track.languageCode };
        }
        logger.warn("Caption track unusable, trying next", {
          context: "captions",
          videoId,
          language: track.languageCode,
          reason: fetched.failure.message,
        });
        lastFailure = fetched.failure;
      }

      return {
        ok: false,
        failure: tierFailure(
          "no_tracks_available",
          lastFailure
            ? `No usable caption track for ${videoId}: ${lastFailure.message}`
            : `No caption tracks listed for ${videoId}`,
          lastFailure?.cause,
        ),
      };
    } catch (error) {
      return { ok: false, failure: unexpected(error) };
    }
  }

  private async listTracks(videoId: string, opts?: CallOptions): Promise<TrackListing> {
    const pageUrl = `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
    const res = await this.fetchFn(pageUrl, {
      headers: { "User-Agent": BROWSER_UA, "Accept-Language": "en-US,en;q=0.9" },
      signal: AbortSignal.timeout(opts?.timeoutMs ?? this.timeoutMs),
    });
    if (!res.ok) {
      return { ok: false, failure: tierFailure("unexpected", `YouTube page fetch failed: ${res.status}`) };
    }

    const player = extractPlayerResponse(await res.text());
    if (!player) {
      return {
        ok: false,
        failure: tierFailure("unexpected", "Could not find ytInitialPlayerResponse in page"),
      };
    }

    const status = player.playabilityStatus?.status;
    if (status && UNAVAILABLE_STATUSES.has(status)) {
      const reason = player.playabilityStatus?.reason ?? status;
      return {
        ok: false,
        failure: tierFailure("source_unavailable", `Video ${videoId} is unavailable: ${reason}`),
      };
    }
    if (status && status !== "OK") {
      // LOGIN_REQUIRED and friends: the video exists but this client was refused
      const reason = player.playabilityStatus?.reason ?? status;
      return {
        ok: false,
        failure: tierFailure("unexpected", `Video ${videoId} not playable: ${reason}`),
      };
    }

    const rawTracks = player.captions?.playerCaptionsTracklistRenderer?.captionTracks;
    if (!rawTracks || rawTracks.length === 0) {
      return {
        ok: false,
        failure: tierFailure("source_disabled", `Captions are disabled for video ${videoId}`),
      };
    }

    const tracks: CaptionTrack[] = [];
    for (const raw of rawTracks) {
      const parsed = captionTrackSchema.safeParse(raw);
      if (parsed.success) {
        tracks.push(parsed.data);
      } else {
        logger.warn("Skipping unreadable caption track entry", {
          context: "captions",
          videoId,
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        });
      }
    }
    if (tracks.length === 0) {
      return {
        ok: false,
        failure: tierFailure("malformed_track", `Caption track list for ${videoId} is unreadable`),
      };
    }
    return { ok: true, tracks };
  }

  private async fetchTrack(track: CaptionTrack, opts?: CallOptions): Promise<TrackFetch> {
    let body: string;
    try {
      const res = await this.fetchFn(timedTextUrl(track.baseUrl), {
        headers: { "User-Agent": BROWSER_UA },
        signal: AbortSignal.timeout(opts?.timeoutMs ?? this.timeoutMs),
      });
      if (!res.ok) {
        return { ok: false, failure: tierFailure("unexpected", `Timedtext fetch failed: ${res.status}`) };
      }
      body = await res.text();
    } catch (error) {
      return { ok: false, failure: unexpected(error) };
    }

    const entries = parseTimedTextPayload(body);
    if (!entries) {
      return {
        ok: false,
        failure: tierFailure(
          "malformed_track",
          `Timedtext payload for "${track.languageCode}" is not valid caption data`,
        ),
      };
    }

    const segments = normalizeSegments(entries, `timedtext:${track.languageCode}`);
    if (segments.length === 0) {
      return {
        ok: false,
        failure: tierFailure("malformed_track", `Timedtext track "${track.languageCode}" has no text`),
      };
    }
    return { ok: true, segments };
  }
}

// --- track selection ---

export function isGenerated(track: { kind?: string; vssId?: string }): boolean {
  return track.kind?.toLowerCase() === "asr" || Boolean(track.vssId?.startsWith("a."));
}

const sameLanguage = (track: CaptionTrack, code: string): boolean =>
  track.languageCode.toLowerCase() === code.toLowerCase();

/** Per requested language, a manual track beats an auto-generated one. */
function findPreferredTrack(tracks: CaptionTrack[], languages: string[]): CaptionTrack | undefined {
  for (const code of languages) {
    const matches = tracks.filter((t) => sameLanguage(t, code));
    const manual = matches.find((t) => !isGenerated(t));
    if (manual) return manual;
    if (matches[0]) return matches[0];
  }
  return undefined;
}

/** Manual preferred-language tracks, then generated ones, then everything else in listing order. */
function rankTracks(tracks: CaptionTrack[], languages: string[]): CaptionTrack[] {
  const ranked: CaptionTrack[] = [];
  const push = (track: CaptionTrack) => {
    if (!ranked.includes(track)) ranked.push(track);
  };

  for (const generated of [false, true]) {
    for (const code of languages) {
      for (const track of tracks) {
        if (isGenerated(track) === generated && sameLanguage(track, code)) push(track);
      }
    }
  }
  tracks.forEach(push);
  return ranked;
}

// --- payload parsing ---

function extractPlayerResponse(html: string): PlayerResponse | null {
  const marker = "var ytInitialPlayerResponse = ";
  const start = html.indexOf(marker);
  if (start === -1) return null;

  const jsonStart = start + marker.length;
  let depth = 0;
  let inString = false;
  let escaping = false;
  let end = -1;
  for (let i = jsonStart; i < html.length; i++) {
    const ch = html[i];
    if (escaping) {
      escaping = false;
    } else if (ch === "\\") {
      escaping = inString;
    } else if (ch === '"') {
      inString = !inString;
    } else if (inString) {
      continue;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
  }

  if (end === -1) return null;
  try {
    const parsed = playerResponseSchema.safeParse(JSON.parse(html.slice(jsonStart, end)));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Drop any `fmt` hint so the endpoint answers with its default XML format. */
function timedTextUrl(baseUrl: string): string {
  try {
    const url = new URL(baseUrl);
    url.searchParams.delete("fmt");
    return url.toString();
  } catch {
    return baseUrl;
  }
}

const htmlDecode = (s: string): string => captionText(s).replace(/\n/g, " ");

const attr = (attrs: string, name: string): string | undefined =>
  attrs.match(new RegExp(`\\b${name}="([^"]*)"`))?.[1];

/**
 * Raw caption entries from a timedtext body: srv1 XML (`<text start dur>`, seconds),
 * srv3 XML (`<p t d>`, milliseconds) or json3. Returns `null` when the body is none of these.
 */
export function parseTimedTextPayload(body: string): unknown[] | null {
  const trimmed = body.trim();

  if (trimmed.startsWith("{")) {
    let data: unknown;
    try {
      data = JSON.parse(trimmed);
    } catch {
      return null;
    }
    if (!isRecord(data) || !Array.isArray(data.events)) return null;
    // window/style events carry no segs
    return data.events.filter((event: unknown) => isRecord(event) && Array.isArray(event.segs));
  }

  if (!/<(transcript|timedtext)\b/.test(trimmed)) return null;

  const entries: unknown[] = [];
  for (const m of trimmed.matchAll(/<text\b([^>]*)>([\s\S]*?)<\/text>/g)) {
    entries.push({ text: htmlDecode(m[2]), start: attr(m[1], "start"), dur: attr(m[1], "dur") });
  }
  for (const m of trimmed.matchAll(/<p\b([^>]*)>([\s\S]*?)<\/p>/g)) {
    entries.push({
      text: htmlDecode(m[2]),
      startMs: attr(m[1], "t"),
      durationMs: attr(m[1], "d"),
    });
  }
  return entries;
}

function unexpected(error: unknown): TierFailure {
  const message =
    error instanceof Error && error.name === "TimeoutError"
      ? "Caption request timed out"
      : `Caption request failed: ${toErrorMessage(error)}`;
  return tierFailure("unexpected", message, error);
}
