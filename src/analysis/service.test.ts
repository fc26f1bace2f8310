import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { closeDatabase, openDatabase, type Db } from "../db/connection.js";
import { AnalysisError } from "../lib/errors.js";
import { TranscriptAcquirer } from "../youtube/acquire.js";
import { TranscriptPipeline } from "../youtube/service.js";
import { TranscriptStore } from "../youtube/store.js";
import type { CaptionResult, TranscriptRecord } from "../youtube/types.js";
import { AnalysisService } from "./service.js";
import { AnalysisStore } from "./store.js";
import type { TranscriptAnalyzer } from "./types.js";

const VIDEO_ID = "dQw4w9WgXcQ";

let db: Db;
let dir: string;
let fetchPreferred: Mock<() => Promise<CaptionResult>>;

beforeEach(async () => {
  db = openDatabase(":memory:");
  dir = await mkdtemp(join(tmpdir(), "caption-pipeline-analyze-"));
  fetchPreferred = vi.fn(async (): Promise<CaptionResult> => ({
    ok: true,
    segments: [{ text: "The answer is yes", start: 0, duration: 2 }],
    language: "en",
  }));
});

afterEach(async () => {
  closeDatabase(db);
  await rm(dir, { recursive: true, force: true });
});

function createService(analyzer: TranscriptAnalyzer) {
  const unused = async (): Promise<CaptionResult> => ({
    ok: false,
    failure: { code: "no_tracks_available", message: "unused" },
  });
  const pipeline = new TranscriptPipeline({
    store: new TranscriptStore({ db, transcriptsDir: dir }),
    acquirer: new TranscriptAcquirer({
      captions: { fetchPreferred, listAndFetchAny: unused },
      subtitleTool: {
        downloadSubtitles: async () => ({
          ok: false,
          failure: { code: "no_captions_offered", message: "unused" },
        }),
      },
    }),
    languages: ["en"],
  });
  const analyses = new AnalysisStore(db);
  return { service: new AnalysisService({ pipeline, analyses, analyzer }), analyses };
}

function createAnalyzer(verdict: unknown = { answer: "Yes", reasoning: "Stated directly.", evidence: ["yes"] }) {
  return { analyze: vi.fn(async (_transcript: TranscriptRecord): Promise<unknown> => verdict) };
}

describe("AnalysisService", () => {
  it("analyzes a fresh transcript and stores the verdict", async () => {
    const analyzer = createAnalyzer();
    const { service, analyses } = createService(analyzer);

    const result = await service.analyze(VIDEO_ID);

    expect(result.cached).toBe(false);
    expect(result.analysis).toMatchObject({ answer: "Yes", reasoning: "Stated directly.", evidence: ["yes"] });
    expect(analyzer.analyze).toHaveBeenCalledWith(
      expect.objectContaining({ videoId: VIDEO_ID, text: "The answer is yes" }),
    );
    expect(analyses.latestForVideo(VIDEO_ID)?.id).toBe(result.analysis.id);
  });

  it("returns the cached verdict on the next call", async () => {
    const analyzer = createAnalyzer();
    const { service } = createService(analyzer);

    const first = await service.analyze(VIDEO_ID);
    const second = await service.analyze(`https://youtu.be/${VIDEO_ID}`);

    expect(second.cached).toBe(true);
    expect(second.analysis).toEqual(first.analysis);
    expect(analyzer.analyze).toHaveBeenCalledTimes(1);
    expect(fetchPreferred).toHaveBeenCalledTimes(1);
  });

  it("re-runs the analyzer when forced", async () => {
    const analyzer = createAnalyzer();
    const { service } = createService(analyzer);

    const first = await service.analyze(VIDEO_ID);
    const forced = await service.analyze(VIDEO_ID, { force: true });

    expect(forced.cached).toBe(false);
    expect(forced.analysis.id).not.toBe(first.analysis.id);
    expect(forced.transcript.id).toBe(first.transcript.id);
    expect(analyzer.analyze).toHaveBeenCalledTimes(2);
  });

  it("re-analyzes after the transcript is overwritten", async () => {
    const analyzer = createAnalyzer();
    const { service } = createService(analyzer);

    const first = await service.analyze(VIDEO_ID);
    const refreshed = await service.analyze(VIDEO_ID, { overwrite: true });

    expect(refreshed.transcript.id).not.toBe(first.transcript.id);
    expect(refreshed.cached).toBe(false);
    expect(fetchPreferred).toHaveBeenCalledTimes(2);
  });

  it("fills verdict defaults", async () => {
    const { service } = createService(createAnalyzer({ answer: "No" }));
    const result = await service.analyze(VIDEO_ID);

    expect(result.analysis).toMatchObject({ answer: "No", reasoning: "", evidence: [], model: null });
  });

  it("rejects a verdict with an unknown answer", async () => {
    const { service, analyses } = createService(createAnalyzer({ answer: "Maybe" }));

    await expect(service.analyze(VIDEO_ID)).rejects.toBeInstanceOf(AnalysisError);
    expect(analyses.latestForVideo(VIDEO_ID)).toBeNull();
  });

  it("wraps analyzer failures", async () => {
    const analyzer = {
      analyze: vi.fn(async (): Promise<unknown> => {
        throw new Error("rate limited");
      }),
    };
    const { service } = createService(analyzer);

    await expect(service.analyze(VIDEO_ID)).rejects.toThrow("Analyzer failed: rate limited");
  });
});
