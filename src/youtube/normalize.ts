import { logger } from "../lib/logger.js";
import type { TranscriptSegment } from "./types.js";

type RawRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is RawRecord =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
};

/** Seconds from whichever of the seconds / milliseconds keys is present. */
const pickSeconds = (record: RawRecord, secondKeys: string[], msKeys: string[]): number | null => {
  for (const key of secondKeys) {
    if (record[key] !== undefined) return toNumber(record[key]);
  }
  for (const key of msKeys) {
    if (record[key] !== undefined) {
      const ms = toNumber(record[key]);
      return ms === null ? null : ms / 1000;
    }
  }
  return 0;
};

const textOf = (record: RawRecord): string | null => {
  if (typeof record.text === "string") return record.text;
  if (typeof record.utf8 === "string") return record.utf8;
  // json3 events carry their text in segs[].utf8
  if (Array.isArray(record.segs)) {
    return record.segs
      .map((seg) => (isRecord(seg) && typeof seg.utf8 === "string" ? seg.utf8 : ""))
      .join("");
  }
  return null;
};

const clamp = (n: number): number => (n < 0 ? 0 : n);

/**
 * Convert one upstream caption entry into a {@link TranscriptSegment}.
 *
 * Accepts `{ text, start, duration | dur }` (seconds), millisecond variants
 * (`startMs`, `durationMs`, json3 `tStartMs` / `dDurationMs`), and `[text, start, duration]`
 * tuples. Returns `null` when the entry has no usable text or times.
 */
export function normalizeSegment(entry: unknown): TranscriptSegment | null {
  let text: string | null;
  let start: number | null;
  let duration: number | null;

  if (Array.isArray(entry)) {
    const [rawText, rawStart, rawDuration] = entry;
    text = typeof rawText === "string" ? rawText : null;
    start = rawStart === undefined ? 0 : toNumber(rawStart);
    duration = rawDuration === undefined ? 0 : toNumber(rawDuration);
  } else if (isRecord(entry)) {
    text = textOf(entry);
    start = pickSeconds(entry, ["start"], ["startMs", "tStartMs"]);
    duration = pickSeconds(entry, ["duration", "dur"], ["durationMs", "dDurationMs"]);
  } else {
    return null;
  }

  if (text === null || start === null || duration === null) return null;
  return { text: text.replace(/\s+/g, " ").trim(), start: clamp(start), duration: clamp(duration) };
}

/**
 * Normalize a whole payload. Unparseable entries are logged and skipped;
 * entries whose text is blank (json3 line breaks, music markers stripped upstream) are dropped.
 */
export function normalizeSegments(entries: Iterable<unknown>, source: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];
  let index = 0;
  for (const entry of entries) {
    const segment = normalizeSegment(entry);
    if (!segment) {
      logger.warn("Skipping unparseable caption entry", { context: "normalize", source, index });
    } else if (segment.text) {
      segments.push(segment);
    }
    index++;
  }
  return segments;
}
