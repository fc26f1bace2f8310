import { debug } from "../lib/logger.js";
import { captionText } from "./entities.js";
import type { TranscriptSegment } from "./types.js";

const TIMESTAMP = String.raw`(?:\d+:)?\d{1,2}:\d{2}(?:[.,]\d+)?`;
const TIMING_LINE = new RegExp(`^(${TIMESTAMP})\\s+-->\\s+(${TIMESTAMP})`);

/** Header and metadata blocks carry no cues and are not worth a log line. */
const NON_CUE_BLOCK = /^(WEBVTT|NOTE|STYLE|REGION)\b/;

/** `HH:MM:SS.mmm`, `MM:SS.mmm` (comma decimals allowed) to seconds. */
export function timestampToSeconds(stamp: string): number {
  const parts = stamp.replace(",", ".").split(":").map(Number);
  return parts.reduce((total, part) => total * 60 + part, 0);
}

function cueText(lines: string[]): string {
  return lines
    .map((line) => captionText(line).trim())
    .filter(Boolean)
    .join(" ");
}

/**
 * Parse WebVTT/SRT-style cue text into timed segments.
 *
 * Blocks without a timing line are logged and skipped; the rest of the input is still parsed.
 */
export function parseCues(raw: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];
  const blocks = raw.replace(/\r\n?/g, "\n").split(/\n[ \t]*\n/);

  blocks.forEach((block, index) => {
    const lines = block.split("\n").filter((line) => line.trim() !== "");
    if (lines.length === 0 || NON_CUE_BLOCK.test(lines[0])) return;

    // optional cue identifier precedes the timing line
    const timingIndex = lines.slice(0, 2).findIndex((line) => TIMING_LINE.test(line.trim()));
    const timing = timingIndex === -1 ? null : lines[timingIndex].trim().match(TIMING_LINE);
    if (!timing) {
      debug("vtt", "Skipping cue block without timing line", { index, preview: lines[0].slice(0, 60) });
      return;
    }

    const text = cueText(lines.slice(timingIndex + 1));
    if (!text) {
      debug("vtt", "Skipping cue block without text", { index, timing: timing[0] });
      return;
    }

    const start = timestampToSeconds(timing[1]);
    const end = timestampToSeconds(timing[2]);
    segments.push({ text, start, duration: Math.max(0, end - start) });
  });

  return segments;
}
