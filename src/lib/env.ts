import "dotenv/config";

/** Env var parsing with fail-fast validation. Never logs actual values. */

type Env = Record<string, string | undefined>;

export type PipelineConfig = {
  dbPath: string;
  transcriptsDir: string;
  /** Preferred caption languages, tried in order before falling back to any track. */
  languages: string[];
  cookiesPath?: string;
  proxy?: string;
  ytDlpPath: string;
  captionsTimeoutMs: number;
  ytDlpTimeoutMs: number;
};

const DEFAULT_LANGUAGES = "en,en-GB,en-US";

function optional(env: Env, name: string): string | undefined {
  const val = env[name]?.trim();
  return val || undefined;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const val = Number(raw);
  if (!Number.isInteger(val) || val <= 0) {
    throw new Error(`Invalid env var ${name}: expected a positive integer`);
  }
  return val;
}

/** Split a comma-separated language list, dropping blanks and duplicates. */
export function parseLanguageList(csv: string): string[] {
  const seen = new Set<string>();
  for (const part of csv.split(",")) {
    const code = part.trim();
    if (code) seen.add(code);
  }
  return [...seen];
}

/** Resolve pipeline settings from the environment (and `.env`, loaded on import). */
export function loadConfig(env: Env = process.env): PipelineConfig {
  const languages = parseLanguageList(optional(env, "YOUTUBE_LANGS") ?? DEFAULT_LANGUAGES);
  if (languages.length === 0) {
    throw new Error("Invalid env var YOUTUBE_LANGS: no language codes given");
  }

  return {
    dbPath: optional(env, "DB_PATH") ?? "data/youtube_transcripts.db",
    transcriptsDir: optional(env, "TRANSCRIPTS_DIR") ?? "data/transcripts",
    languages,
    cookiesPath: optional(env, "YOUTUBE_COOKIES"),
    proxy: optional(env, "HTTPS_PROXY"),
    ytDlpPath: optional(env, "YTDLP_PATH") ?? "yt-dlp",
    captionsTimeoutMs: positiveInt(env, "CAPTIONS_TIMEOUT_MS", 15_000),
    ytDlpTimeoutMs: positiveInt(env, "YTDLP_TIMEOUT_MS", 60_000),
  };
}
