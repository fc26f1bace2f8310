import type { Db } from "../db/connection.js";
import { toErrorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { MetadataLookup, VideoMetadata } from "./types.js";

type MetadataRow = {
  title: string | null;
  channel: string | null;
  fetch_date: string;
};

export type CachedMetadataLookupOptions = {
  db: Db;
  /** Source consulted on a cache miss. */
  lookup: MetadataLookup;
};

const toMetadata = (row: MetadataRow): VideoMetadata => ({
  ...(row.title ? { title: row.title } : {}),
  ...(row.channel ? { channel: row.channel } : {}),
});

/**
 * Read-through cache over another {@link MetadataLookup}, kept in the `video_metadata` table.
 *
 * Whatever the inner lookup returns is stored, empty results included. Cache read or write
 * failures are logged and fall back to the inner lookup.
 */
export class CachedMetadataLookup implements MetadataLookup {
  private readonly db: Db;
  private readonly lookup: MetadataLookup;

  constructor(opts: CachedMetadataLookupOptions) {
    this.db = opts.db;
    this.lookup = opts.lookup;
  }

  async lookupTitleAndChannel(videoId: string): Promise<VideoMetadata> {
    const cached = this.read(videoId);
    if (cached) {
      logger.debug("Using cached video metadata", {
        context: "metadata",
        videoId,
        fetchDate: cached.fetch_date,
      });
      return toMetadata(cached);
    }

    const found = await this.lookup.lookupTitleAndChannel(videoId);
    this.write(videoId, found);
    return found;
  }

  private read(videoId: string): MetadataRow | undefined {
    try {
      return this.db
        .prepare<[string], MetadataRow>(
          "SELECT title, channel, fetch_date FROM video_metadata WHERE video_id = ?",
        )
        .get(videoId);
    } catch (error) {
      logger.warn("Video metadata cache read failed", {
        context: "metadata",
        videoId,
        error: toErrorMessage(error),
      });
      return undefined;
    }
  }

  private write(videoId: string, metadata: VideoMetadata): void {
    try {
      this.db
        .prepare<[string, string | null, string | null, string]>(
          "INSERT OR REPLACE INTO video_metadata (video_id, title, channel, fetch_date) VALUES (?, ?, ?, ?)",
        )
        .run(videoId, metadata.title ?? null, metadata.channel ?? null, new Date().toISOString());
    } catch (error) {
      logger.warn("Video metadata cache write failed", {
        context: "metadata",
        videoId,
        error: toErrorMessage(error),
      });
    }
  }
}
