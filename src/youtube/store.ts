import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Db } from "../db/connection.js";
import { StorageError, toErrorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { MetadataLookup, TranscriptRecord, TranscriptSegment, VideoMetadata } from "./types.js";

export type TranscriptStoreOptions = {
  db: Db;
  /** Directory for the human-readable transcript artifacts. */
  transcriptsDir: string;
  /** Consulted only when the caller supplies no title or channel. */
  metadata?: MetadataLookup;
};

export type SaveTranscriptOptions = {
  title?: string;
  channel?: string;
  language?: string;
  overwrite?: boolean;
};

export type SaveResult = {
  /** Path of the text artifact for this video. */
  location: string;
  /** False when a row already existed and `overwrite` was not set. */
  inserted: boolean;
};

type TranscriptRow = {
  id: number;
  video_id: string;
  title: string | null;
  channel: string | null;
  text: string;
  language: string | null;
  extraction_date: string;
};

const TITLE_MAX = 60;

export const unknownTitle = (videoId: string): string => `Unknown Title – ${videoId}`;
export const UNKNOWN_CHANNEL = "Unknown Channel";

// --- formatting ---

const safeName = (value: string): string => value.replace(/[^\w\s-]/g, "").replace(/\s+/g, "_");

/** `<dir>/transcript_<id>_<title>.txt`, with the title reduced to a filesystem-safe slug. */
export function artifactPath(dir: string, videoId: string, title: string): string {
  return join(dir, `transcript_${safeName(videoId)}_${safeName(title).slice(0, TITLE_MAX)}.txt`);
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** One `[MM:SS] text` line per segment; minutes keep counting past 59. */
export function formatTranscript(segments: TranscriptSegment[]): string {
  return segments
    .map((s) => {
      const total = Math.floor(s.start);
      return `[${pad(Math.floor(total / 60))}:${pad(total % 60)}] ${s.text}`;
    })
    .join("\n");
}

function toRecord(row: TranscriptRow): TranscriptRecord {
  return {
    id: row.id,
    videoId: row.video_id,
    title: row.title ?? unknownTitle(row.video_id),
    channel: row.channel ?? UNKNOWN_CHANNEL,
    text: row.text,
    language: row.language,
    extractionDate: row.extraction_date,
  };
}

// --- store ---

const COLUMNS = "id, video_id, title, channel, text, language, extraction_date";

/**
 * SQLite-backed transcript persistence plus a text artifact per video.
 *
 * The newest row for a video is its current transcript. Saves without `overwrite`
 * never replace an existing row.
 */
export class TranscriptStore {
  private readonly db: Db;
  private readonly transcriptsDir: string;
  private readonly metadata?: MetadataLookup;

  constructor(opts: TranscriptStoreOptions) {
    this.db = opts.db;
    this.transcriptsDir = opts.transcriptsDir;
    this.metadata = opts.metadata;
  }

  exists(videoId: string): boolean {
    return this.query(() =>
      this.db
        .prepare<[string], { found: number }>(
          "SELECT 1 AS found FROM transcripts WHERE video_id = ? LIMIT 1",
        )
        .get(videoId) !== undefined,
    );
  }

  latestByVideoId(videoId: string): TranscriptRecord | null {
    const row = this.query(() =>
      this.db
        .prepare<[string], TranscriptRow>(
          `SELECT ${COLUMNS} FROM transcripts WHERE video_id = ?
           ORDER BY extraction_date DESC, id DESC LIMIT 1`,
        )
        .get(videoId),
    );
    return row ? toRecord(row) : null;
  }

  getById(id: number): TranscriptRecord | null {
    const row = this.query(() =>
      this.db
        .prepare<[number], TranscriptRow>(`SELECT ${COLUMNS} FROM transcripts WHERE id = ?`)
        .get(id),
    );
    return row ? toRecord(row) : null;
  }

  /** Most recent transcripts first. */
  list(limit = 15): TranscriptRecord[] {
    const rows = this.query(() =>
      this.db
        .prepare<[number], TranscriptRow>(
          `SELECT ${COLUMNS} FROM transcripts ORDER BY extraction_date DESC, id DESC LIMIT ?`,
        )
        .all(limit),
    );
    return rows.map(toRecord);
  }

  async save(
    segments: TranscriptSegment[],
    videoId: string,
    opts: SaveTranscriptOptions = {},
  ): Promise<SaveResult> {
    const overwrite = opts.overwrite ?? false;

    if (!overwrite) {
      const existing = this.latestByVideoId(videoId);
      if (existing) {
        logger.info("Transcript already stored", { context: "store", videoId, id: existing.id });
        return {
          location: artifactPath(this.transcriptsDir, videoId, existing.title),
          inserted: false,
        };
      }
    }

    const { title, channel } = await this.resolveMetadata(videoId, opts);
    const location = artifactPath(this.transcriptsDir, videoId, title);

    const inserted = this.insert({
      videoId,
      title,
      channel,
      text: segments.map((s) => s.text).join("\n"),
      language: opts.language ?? null,
      overwrite,
    });
    // only the save whose row landed writes the artifact
    if (inserted) await this.writeArtifact(location, segments);

    logger.info(inserted ? "Transcript stored" : "Transcript already stored", {
      context: "store",
      videoId,
      overwrite,
      location,
    });
    return { location, inserted };
  }

  private insert(row: {
    videoId: string;
    title: string;
    channel: string;
    text: string;
    language: string | null;
    overwrite: boolean;
  }): boolean {
    try {
      const findStmt = this.db.prepare<[string], { id: number }>(
        "SELECT id FROM transcripts WHERE video_id = ? LIMIT 1",
      );
      const deleteStmt = this.db.prepare<[string]>("DELETE FROM transcripts WHERE video_id = ?");
      const insertStmt = this.db.prepare<[string, string, string, string, string | null, string]>(
        `INSERT INTO transcripts (video_id, title, channel, text, language, extraction_date)
         VALUES (?, ?, ?, ?, ?, ?)`,
      );

      // exists, delete and insert share one write lock so concurrent saves of a video serialize
      const write = this.db.transaction((): boolean => {
        if (findStmt.get(row.videoId)) {
          if (!row.overwrite) return false;
          deleteStmt.run(row.videoId);
        }
        insertStmt.run(
          row.videoId,
          row.title,
          row.channel,
          row.text,
          row.language,
          new Date().toISOString(),
        );
        return true;
      });
      return write.immediate();
    } catch (error) {
      logger.error("Failed to store transcript", {
        context: "store",
        videoId: row.videoId,
        error: toErrorMessage(error),
      });
      throw new StorageError(`Failed to store transcript for ${row.videoId}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async resolveMetadata(
    videoId: string,
    opts: SaveTranscriptOptions,
  ): Promise<{ title: string; channel: string }> {
    let found: VideoMetadata = {};
    if ((!opts.title || !opts.channel) && this.metadata) {
      try {
        found = await this.metadata.lookupTitleAndChannel(videoId);
      } catch (error) {
        logger.warn("Metadata lookup failed", { context: "store", videoId, error: toErrorMessage(error) });
      }
    }
    return {
      title: opts.title || found.title || unknownTitle(videoId),
      channel: opts.channel || found.channel || UNKNOWN_CHANNEL,
    };
  }

  /** Artifact problems are logged, never fatal: the database row is the source of truth. */
  private async writeArtifact(location: string, segments: TranscriptSegment[]): Promise<void> {
    try {
      await mkdir(this.transcriptsDir, { recursive: true });
      await writeFile(location, formatTranscript(segments), "utf8");
    } catch (error) {
      logger.error("Failed to write transcript artifact", {
        context: "store",
        location,
        error: toErrorMessage(error),
      });
      try {
        await writeFile(location, `Error processing transcript: ${toErrorMessage(error)}`, "utf8");
      } catch (fallbackError) {
        logger.error("Failed to write transcript error placeholder", {
          context: "store",
          location,
          error: toErrorMessage(fallbackError),
        });
      }
    }
  }

  private query<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new StorageError(`Transcript query failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}
