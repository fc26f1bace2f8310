import { execFile } from "node:child_process";
import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import { z } from "zod";
import { TranscriptError, tierFailure, toErrorMessage } from "../lib/errors.js";
import { debug, logger } from "../lib/logger.js";
import { isRecord } from "./normalize.js";
import type {
  CallOptions,
  MetadataLookup,
  SubtitleDownload,
  SubtitleTool,
  VideoMetadata,
} from "./types.js";

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Runs yt-dlp with `args` and resolves with its stdout. */
export type ToolRunner = (args: string[], opts: { timeoutMs: number }) => Promise<string>;

export type YtDlpOptions = {
  runner?: ToolRunner;
  /** yt-dlp executable; ignored when `runner` is given. */
  binary?: string;
  timeoutMs?: number;
  /** Netscape-format cookies file passed as `--cookies`. */
  cookiesPath?: string;
  proxy?: string;
};

/**
 * Default runner: shells out via `execFile`.
 *
 * Rejects with `fallback_tool_unavailable` when the binary is missing and
 * `fallback_extraction_failed` for any other invocation error (non-zero exit, timeout).
 */
export function createYtDlpRunner(binary = "yt-dlp"): ToolRunner {
  return async (args, { timeoutMs }) => {
    try {
      const { stdout } = await execFileAsync(binary, args, {
        timeout: timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
      });
      return stdout;
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        throw new TranscriptError("fallback_tool_unavailable", `${binary} is not installed or not on PATH`, {
          cause: error,
        });
      }
      if (isRecord(error) && error.killed === true) {
        throw new TranscriptError("fallback_extraction_failed", `${binary} timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      const stderr = isRecord(error) && typeof error.stderr === "string" ? lastLine(error.stderr) : "";
      throw new TranscriptError(
        "fallback_extraction_failed",
        `${binary} failed: ${stderr || toErrorMessage(error)}`,
        { cause: error },
      );
    }
  };
}

// --- info JSON ---

const subtitleFormatSchema = z.object({
  ext: z.string().optional(),
  url: z.string(),
});

type SubtitleFormat = z.infer<typeof subtitleFormatSchema>;

const trackMapSchema = z.record(z.array(z.unknown())).nullish();

const infoSchema = z.object({
  id: z.string().optional(),
  title: z.string().nullish(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  subtitles: trackMapSchema,
  automatic_captions: trackMapSchema,
});

export type YtDlpInfo = z.infer<typeof infoSchema>;

type TrackMap = Map<string, SubtitleFormat[]>;

function toTrackMap(raw: Record<string, unknown[]> | null | undefined): TrackMap {
  const map: TrackMap = new Map();
  for (const [language, formats] of Object.entries(raw ?? {})) {
    // chat replays show up as a pseudo-language
    if (language === "live_chat") continue;
    const usable: SubtitleFormat[] = [];
    for (const format of formats) {
      const parsed = subtitleFormatSchema.safeParse(format);
      if (parsed.success) usable.push(parsed.data);
    }
    if (usable.length > 0) map.set(language, usable);
  }
  return map;
}

export type SelectedSubtitle = { language: string; format: SubtitleFormat; automatic: boolean };

/**
 * Manual subtitles in requested-language order, then automatic captions in the same order,
 * then any manual track, then any automatic track (the untranslated `-orig` one if offered).
 * Within the track a WebVTT resource is preferred.
 */
export function selectSubtitle(info: YtDlpInfo, languages: string[]): SelectedSubtitle | null {
  const manual = toTrackMap(info.subtitles);
  const automatic = toTrackMap(info.automatic_captions);

  const choose = (language: string, formats: SubtitleFormat[], isAuto: boolean): SelectedSubtitle => ({
    language,
    format: formats.find((f) => f.ext === "vtt") ?? formats[0],
    automatic: isAuto,
  });

  for (const [map, isAuto] of [
    [manual, false],
    [automatic, true],
  ] as const) {
    for (const code of languages) {
      const formats = map.get(code);
      if (formats) return choose(code, formats, isAuto);
    }
  }

  const [firstManual] = manual;
  if (firstManual) return choose(firstManual[0], firstManual[1], false);

  const original = [...automatic].find(([code]) => code.endsWith("-orig"));
  const [firstAuto] = automatic;
  const fallback = original ?? firstAuto;
  return fallback ? choose(fallback[0], fallback[1], true) : null;
}

const watchUrl = (videoId: string): string => `https://www.youtube.com/watch?v=${videoId}`;

/** Cookies and proxy go on every invocation so all requests leave from the same session. */
const accessArgs = (opts: YtDlpOptions): string[] => [
  ...(opts.cookiesPath ? ["--cookies", opts.cookiesPath] : []),
  ...(opts.proxy ? ["--proxy", opts.proxy] : []),
];

function metadataOf(info: YtDlpInfo): VideoMetadata {
  const channel = info.channel ?? info.uploader;
  return {
    ...(info.title ? { title: info.title } : {}),
    ...(channel ? { channel } : {}),
  };
}

async function dumpInfo(
  runner: ToolRunner,
  videoId: string,
  extraArgs: string[],
  opts: YtDlpOptions,
  timeoutMs: number,
): Promise<YtDlpInfo> {
  const args = [
    "--skip-download",
    "--dump-single-json",
    "--no-warnings",
    ...extraArgs,
    ...accessArgs(opts),
    watchUrl(videoId),
  ];
  const stdout = await runner(args, { timeoutMs });

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new TranscriptError("fallback_extraction_failed", "yt-dlp printed invalid JSON", {
      cause: error,
    });
  }
  const parsed = infoSchema.safeParse(json);
  if (!parsed.success) {
    throw new TranscriptError("fallback_extraction_failed", "yt-dlp info JSON has an unexpected shape", {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// --- subtitle fallback ---

/**
 * Last-resort tier: asks yt-dlp which subtitle tracks exist, then has it write the chosen
 * one to a temp file. Both runs share cookies and proxy, so the signed track URL is
 * fetched from the same session that resolved it.
 */
export class YtDlpSubtitleTool implements SubtitleTool {
  private readonly runner: ToolRunner;
  private readonly timeoutMs: number;

  constructor(private readonly opts: YtDlpOptions = {}) {
    this.runner = opts.runner ?? createYtDlpRunner(opts.binary);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async downloadSubtitles(
    videoId: string,
    languages: string[],
    callOpts?: CallOptions,
  ): Promise<SubtitleDownload> {
    const timeoutMs = callOpts?.timeoutMs ?? this.timeoutMs;

    let info: YtDlpInfo;
    try {
      info = await dumpInfo(
        this.runner,
        videoId,
        ["--write-subs", "--write-auto-subs", "--sub-langs", languages.join(",")],
        this.opts,
        timeoutMs,
      );
    } catch (error) {
      return { ok: false, failure: asFailure(error) };
    }

    const selected = selectSubtitle(info, languages);
    if (!selected) {
      return {
        ok: false,
        failure: tierFailure("no_captions_offered", `yt-dlp reports no subtitle tracks for ${videoId}`),
      };
    }

    const format = selected.format.ext ?? "vtt";
    logger.info("Downloading subtitles via yt-dlp", {
      context: "ytdlp",
      videoId,
      language: selected.language,
      ext: format,
      automatic: selected.automatic,
    });

    let raw: string;
    try {
      raw = await this.writeSubtitleFile(videoId, selected.language, format, selected.automatic, timeoutMs);
    } catch (error) {
      return { ok: false, failure: asFailure(error) };
    }

    return { ok: true, raw, language: selected.language, format, metadata: metadataOf(info) };
  }

  private async writeSubtitleFile(
    videoId: string,
    language: string,
    format: string,
    automatic: boolean,
    timeoutMs: number,
  ): Promise<string> {
    const outTemplate = join(tmpdir(), `caption-pipeline-${randomUUID()}`);
    await this.runner(
      [
        "--skip-download",
        "--no-warnings",
        automatic ? "--write-auto-subs" : "--write-subs",
        "--sub-langs",
        language,
        "--sub-format",
        format,
        "-o",
        outTemplate,
        ...accessArgs(this.opts),
        watchUrl(videoId),
      ],
      { timeoutMs },
    );

    // yt-dlp writes to <template>.<lang>.<ext>
    const subPath = `${outTemplate}.${language}.${format}`;
    try {
      return await readFile(subPath, "utf8");
    } catch (error) {
      throw new TranscriptError(
        "fallback_extraction_failed",
        `yt-dlp wrote no subtitle file for "${language}"`,
        { cause: error },
      );
    } finally {
      await removeFile(subPath);
    }
  }
}

async function removeFile(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    debug("ytdlp", "Could not remove temp subtitle file", { path, error: toErrorMessage(error) });
  }
}

// --- metadata ---

/** Best-effort title/channel lookup from yt-dlp's info JSON; any failure yields `{}`. */
export class YtDlpMetadataLookup implements MetadataLookup {
  private readonly runner: ToolRunner;
  private readonly timeoutMs: number;

  constructor(private readonly opts: YtDlpOptions = {}) {
    this.runner = opts.runner ?? createYtDlpRunner(opts.binary);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async lookupTitleAndChannel(videoId: string): Promise<VideoMetadata> {
    try {
      return metadataOf(await dumpInfo(this.runner, videoId, [], this.opts, this.timeoutMs));
    } catch (error) {
      debug("ytdlp", "Metadata lookup failed", { videoId, error: toErrorMessage(error) });
      return {};
    }
  }
}

function asFailure(error: unknown) {
  if (error instanceof TranscriptError) return tierFailure(error.code, error.message, error.cause);
  return tierFailure("fallback_extraction_failed", `yt-dlp failed: ${toErrorMessage(error)}`, error);
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1]?.trim() ?? "";
}
