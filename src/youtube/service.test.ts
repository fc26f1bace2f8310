import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { closeDatabase, openDatabase, type Db } from "../db/connection.js";
import type { PipelineConfig } from "../lib/env.js";
import { InvalidReferenceError, TranscriptAcquisitionError } from "../lib/errors.js";
import { createPipeline } from "./service.js";

// --- Fixtures ---

const VIDEO_ID = "dQw4w9WgXcQ";

const PLAYER_RESPONSE = {
  playabilityStatus: { status: "OK" },
  videoDetails: {
    title: "Test Video Title",
    shortDescription: "A test description",
  },
  captions: {
    playerCaptionsTracklistRenderer: {
      captionTracks: [
        { baseUrl: "https://www.youtube.com/api/timedtext?v=test&lang=en", languageCode: "en" },
        { baseUrl: "https://www.youtube.com/api/timedtext?v=test&lang=es", languageCode: "es" },
      ],
    },
  },
};

function makeWatchPageHtml(playerResponse: unknown): string {
  return `<!DOCTYPE html><html><head></head><body>
<script>var ytInitialPlayerResponse = ${JSON.stringify(playerResponse)};</script>
</body></html>`;
}

const TIMED_TEXT_XML = `<?xml version="1.0" encoding="utf-8" ?>
<transcript>
  <text start="0.0" dur="2.5">Hello world</text>
  <text start="2.5" dur="3.0">This is a test &amp; demo</text>
  <text start="5.5" dur="1.5">It&#39;s working</text>
</transcript>`;

const YTDLP_INFO = {
  id: VIDEO_ID,
  title: "Test Video Title",
  channel: "Test Channel",
  subtitles: { en: [{ ext: "vtt", url: "https://subs.example.test/en.vtt" }] },
  automatic_captions: {},
};

const SUBTITLE_VTT = "WEBVTT\n\n00:00:01.000 --> 00:00:04.000\nHello from yt-dlp\n";

function createMockFetch(overrides?: {
  pageHtml?: string;
  pageStatus?: number;
  xmlBody?: string;
  xmlStatus?: number;
}) {
  const pageHtml = overrides?.pageHtml ?? makeWatchPageHtml(PLAYER_RESPONSE);
  const pageStatus = overrides?.pageStatus ?? 200;
  const xmlBody = overrides?.xmlBody ?? TIMED_TEXT_XML;
  const xmlStatus = overrides?.xmlStatus ?? 200;

  return vi.fn(async (url: string) => {
    if (url.includes("youtube.com/watch")) {
      return new Response(pageHtml, { status: pageStatus });
    }
    if (url.includes("timedtext")) {
      return new Response(xmlBody, { status: xmlStatus });
    }
    return new Response("not found", { status: 404 });
  });
}

/** Info dumps print the fixture; `-o` runs write the requested subtitle file. */
function createRunner() {
  return vi.fn(async (args: string[], _opts: { timeoutMs: number }) => {
    const out = args.indexOf("-o");
    if (out === -1) return JSON.stringify(YTDLP_INFO);
    const language = args[args.indexOf("--sub-langs") + 1];
    const ext = args[args.indexOf("--sub-format") + 1];
    await writeFile(`${args[out + 1]}.${language}.${ext}`, SUBTITLE_VTT);
    return "";
  });
}

let db: Db;
let dir: string;
let config: PipelineConfig;

beforeEach(async () => {
  db = openDatabase(":memory:");
  dir = await mkdtemp(join(tmpdir(), "caption-pipeline-service-"));
  config = {
    dbPath: ":memory:",
    transcriptsDir: dir,
    languages: ["en"],
    ytDlpPath: "yt-dlp",
    captionsTimeoutMs: 1_000,
    ytDlpTimeoutMs: 1_000,
  };
});

afterEach(async () => {
  closeDatabase(db);
  await rm(dir, { recursive: true, force: true });
});

// --- acquireTranscript (integration) ---

describe("TranscriptPipeline.acquireTranscript", () => {
  it("full flow: parse → fetch captions → store → return", async () => {
    const fetchFn = createMockFetch();
    const runner = createRunner();
    const pipeline = createPipeline(config, db, { fetchFn, runner });

    const record = await pipeline.acquireTranscript("https://www.youtube.com/watch?v=dQw4w9WgXcQ");

    expect(record).toMatchObject({
      videoId: VIDEO_ID,
      title: "Test Video Title",
      channel: "Test Channel",
      text: "Hello world\nThis is a test & demo\nIt's working",
      language: "en",
    });
    const artifact = join(dir, "transcript_dQw4w9WgXcQ_Test_Video_Title.txt");
    expect(await readFile(artifact, "utf8")).toBe(
      "[00:00] Hello world\n[00:02] This is a test & demo\n[00:05] It's working",
    );
  });

  it("serves the stored transcript on the next call", async () => {
    const fetchFn = createMockFetch();
    const pipeline = createPipeline(config, db, { fetchFn, runner: createRunner() });

    const first = await pipeline.acquireTranscript(VIDEO_ID);
    const callsAfterFirst = fetchFn.mock.calls.length;
    const second = await pipeline.acquireTranscript("https://youtu.be/dQw4w9WgXcQ");

    expect(second).toEqual(first);
    expect(fetchFn.mock.calls.length).toBe(callsAfterFirst);
  });

  it("re-acquires and replaces the row when overwriting", async () => {
    const fetchFn = createMockFetch();
    const pipeline = createPipeline(config, db, { fetchFn, runner: createRunner() });

    const first = await pipeline.acquireTranscript(VIDEO_ID);
    const second = await pipeline.acquireTranscript(VIDEO_ID, true);

    expect(second.id).not.toBe(first.id);
    expect(second.text).toBe(first.text);
    expect(pipeline.store.list()).toHaveLength(1);
  });

  it("falls back to yt-dlp subtitles when the captions API fails", async () => {
    const fetchFn = createMockFetch({ xmlStatus: 500, xmlBody: "" });
    const runner = createRunner();
    const pipeline = createPipeline(config, db, { fetchFn, runner });

    const record = await pipeline.acquireTranscript(VIDEO_ID);

    expect(record).toMatchObject({ videoId: VIDEO_ID, text: "Hello from yt-dlp", language: "en" });
    expect(runner.mock.calls[0][0]).toContain("--write-subs");
  });

  it("takes title and channel from the yt-dlp fallback without another lookup", async () => {
    const fetchFn = createMockFetch({ xmlStatus: 500, xmlBody: "" });
    const runner = createRunner();
    const pipeline = createPipeline(config, db, { fetchFn, runner });

    const record = await pipeline.acquireTranscript(VIDEO_ID);

    expect(record).toMatchObject({ title: "Test Video Title", channel: "Test Channel" });
    // one info dump plus one subtitle write
    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner.mock.calls[1][0]).toContain("-o");
  });

  it("looks metadata up once and serves it from the cache on overwrite", async () => {
    const fetchFn = createMockFetch();
    const runner = createRunner();
    const pipeline = createPipeline(config, db, { fetchFn, runner });

    await pipeline.acquireTranscript(VIDEO_ID);
    const refreshed = await pipeline.acquireTranscript(VIDEO_ID, true);

    expect(refreshed).toMatchObject({ title: "Test Video Title", channel: "Test Channel" });
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it("rejects with source_disabled and skips yt-dlp when captions are off", async () => {
    const noCaptions = { ...PLAYER_RESPONSE, captions: {} };
    const fetchFn = createMockFetch({ pageHtml: makeWatchPageHtml(noCaptions) });
    const runner = createRunner();
    const pipeline = createPipeline(config, db, { fetchFn, runner });

    const attempt = pipeline.acquireTranscript(VIDEO_ID);

    await expect(attempt).rejects.toBeInstanceOf(TranscriptAcquisitionError);
    await expect(attempt).rejects.toMatchObject({ code: "source_disabled", videoId: VIDEO_ID });
    expect(runner).not.toHaveBeenCalled();
    expect(pipeline.store.exists(VIDEO_ID)).toBe(false);
  });

  it("rejects an invalid reference before any network call", async () => {
    const fetchFn = createMockFetch();
    const pipeline = createPipeline(config, db, { fetchFn, runner: createRunner() });

    await expect(pipeline.acquireTranscript("https://vimeo.com/123")).rejects.toBeInstanceOf(
      InvalidReferenceError,
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
