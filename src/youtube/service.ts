import type { Db } from "../db/connection.js";
import type { PipelineConfig } from "../lib/env.js";
import { StorageError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { TranscriptAcquirer } from "./acquire.js";
import { YouTubeCaptionSource } from "./captions.js";
import { CachedMetadataLookup } from "./metadata-cache.js";
import { extractVideoId } from "./parse-url.js";
import { TranscriptStore } from "./store.js";
import type { FetchFn, TranscriptRecord } from "./types.js";
import { YtDlpMetadataLookup, YtDlpSubtitleTool, type ToolRunner } from "./ytdlp.js";

export type TranscriptPipelineDeps = {
  store: TranscriptStore;
  acquirer: TranscriptAcquirer;
  /** Preferred caption languages, most wanted first. */
  languages: string[];
  /** Per-tier timeout; when unset each adapter uses its own default. */
  timeoutMs?: number;
};

/**
 * Main entry point: turn a video reference into a stored transcript.
 *
 * Returns the cached record unless `overwrite` is set. Throws
 * `InvalidReferenceError`, `TranscriptAcquisitionError` or `StorageError`.
 */
export class TranscriptPipeline {
  readonly store: TranscriptStore;
  private readonly acquirer: TranscriptAcquirer;
  private readonly languages: string[];
  private readonly timeoutMs?: number;

  constructor(deps: TranscriptPipelineDeps) {
    this.store = deps.store;
    this.acquirer = deps.acquirer;
    this.languages = deps.languages;
    this.timeoutMs = deps.timeoutMs;
  }

  async acquireTranscript(reference: string, overwrite = false): Promise<TranscriptRecord> {
    const videoId = extractVideoId(reference);

    if (!overwrite) {
      const cached = this.store.latestByVideoId(videoId);
      if (cached) {
        logger.info("Using stored transcript", { context: "pipeline", videoId, id: cached.id });
        return cached;
      }
    }

    const outcome = await this.acquirer.acquire(
      videoId,
      this.languages,
      this.timeoutMs === undefined ? undefined : { timeoutMs: this.timeoutMs },
    );
    if (!outcome.ok) throw outcome.error;

    await this.store.save(outcome.segments, videoId, {
      title: outcome.metadata?.title,
      channel: outcome.metadata?.channel,
      language: outcome.language,
      overwrite,
    });

    const record = this.store.latestByVideoId(videoId);
    if (!record) {
      throw new StorageError(`Transcript for ${videoId} was saved but could not be read back`);
    }
    return record;
  }
}

export type CreatePipelineOptions = {
  fetchFn?: FetchFn;
  /** Replaces the yt-dlp subprocess, e.g. in tests. */
  runner?: ToolRunner;
};

/** Wire the default YouTube adapters, yt-dlp fallback and SQLite store from configuration. */
export function createPipeline(
  config: PipelineConfig,
  db: Db,
  opts: CreatePipelineOptions = {},
): TranscriptPipeline {
  const ytDlp = {
    runner: opts.runner,
    binary: config.ytDlpPath,
    timeoutMs: config.ytDlpTimeoutMs,
    cookiesPath: config.cookiesPath,
    proxy: config.proxy,
  };

  return new TranscriptPipeline({
    store: new TranscriptStore({
      db,
      transcriptsDir: config.transcriptsDir,
      metadata: new CachedMetadataLookup({ db, lookup: new YtDlpMetadataLookup(ytDlp) }),
    }),
    acquirer: new TranscriptAcquirer({
      captions: new YouTubeCaptionSource({
        fetchFn: opts.fetchFn,
        timeoutMs: config.captionsTimeoutMs,
      }),
      subtitleTool: new YtDlpSubtitleTool(ytDlp),
    }),
    languages: config.languages,
  });
}
