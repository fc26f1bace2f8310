import { InvalidReferenceError } from "../lib/errors.js";

// 11-char base64-ish ID (letters, digits, hyphens, underscores)
const ID = /^[\w-]{11}$/;

const WATCH_HOSTS = new Set(["youtube.com", "m.youtube.com", "music.youtube.com"]);
const PATH_ID = /^\/(embed|v|shorts|live)\/([^/?#]+)/;

/**
 * Extract a YouTube video ID from common URL formats.
 *
 * Handles:
 *  - youtube.com/watch?v=ID
 *  - youtu.be/ID
 *  - youtube.com/embed/ID, youtube-nocookie.com/embed/ID
 *  - youtube.com/v/ID
 *  - youtube.com/shorts/ID, youtube.com/live/ID
 *
 * The scheme may be omitted. Returns `null` when the URL isn't a recognised YouTube link.
 */
export function parseYouTubeVideoId(url: string): string | null {
  const u = toUrl(url.trim());
  if (!u) return null;

  const host = u.hostname.replace(/^www\./, "");

  if (host === "youtu.be") {
    const id = u.pathname.slice(1).split("/")[0];
    return id && ID.test(id) ? id : null;
  }

  if (WATCH_HOSTS.has(host) || host === "youtube-nocookie.com") {
    if (WATCH_HOSTS.has(host) && u.pathname === "/watch") {
      const v = u.searchParams.get("v");
      return v && ID.test(v) ? v : null;
    }

    const match = u.pathname.match(PATH_ID);
    if (match && (WATCH_HOSTS.has(host) || match[1] === "embed")) {
      return ID.test(match[2]) ? match[2] : null;
    }
  }

  return null;
}

/**
 * Resolve a caller-supplied reference (URL or bare ID) to a canonical video ID.
 *
 * @throws InvalidReferenceError when the reference is neither a supported URL nor a bare ID.
 */
export function extractVideoId(reference: string): string {
  const trimmed = reference.trim();
  if (!trimmed) {
    throw new InvalidReferenceError(reference, "Video reference is empty");
  }

  if (ID.test(trimmed)) return trimmed;

  if (looksLikeUrl(trimmed)) {
    const id = parseYouTubeVideoId(trimmed);
    if (id) return id;
    throw new InvalidReferenceError(
      reference,
      `Unsupported video URL: ${trimmed} (looks like a URL but matches no known YouTube shape)`,
    );
  }

  throw new InvalidReferenceError(
    reference,
    `Invalid video reference: ${trimmed} (not a URL and not an 11-character video ID)`,
  );
}

function looksLikeUrl(value: string): boolean {
  return /^[a-z][a-z\d+.-]*:\/\//i.test(value) || /^[\w-]+(\.[\w-]+)+(\/|$|\?)/.test(value);
}

function toUrl(value: string): URL | null {
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(value) ? value : `https://${value}`;
  try {
    return new URL(withScheme);
  } catch {
    // not a valid URL
    return null;
  }
}
