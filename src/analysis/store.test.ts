import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDatabase, openDatabase, type Db } from "../db/connection.js";
import { TranscriptStore } from "../youtube/store.js";
import { AnalysisStore } from "./store.js";

const VIDEO_ID = "dQw4w9WgXcQ";
const SEGMENTS = [{ text: "Hello world", start: 0, duration: 1 }];

let db: Db;
let dir: string;
let transcripts: TranscriptStore;

beforeEach(async () => {
  db = openDatabase(":memory:");
  dir = await mkdtemp(join(tmpdir(), "caption-pipeline-analysis-"));
  transcripts = new TranscriptStore({ db, transcriptsDir: dir });
});

afterEach(async () => {
  closeDatabase(db);
  await rm(dir, { recursive: true, force: true });
});

async function storeTranscript(overwrite = false): Promise<number> {
  await transcripts.save(SEGMENTS, VIDEO_ID, { title: "T", channel: "C", overwrite });
  const record = transcripts.latestByVideoId(VIDEO_ID);
  if (!record) throw new Error("transcript missing");
  return record.id;
}

describe("AnalysisStore", () => {
  it("round-trips a verdict with its evidence", async () => {
    const analyses = new AnalysisStore(db);
    const transcriptId = await storeTranscript();

    const saved = analyses.save(transcriptId, {
      answer: "Yes",
      reasoning: "The speaker says so.",
      evidence: ["quote one", "quote two"],
      model: "test-model",
      tokensUsed: 120,
    });

    expect(analyses.latestForTranscript(transcriptId)).toEqual(saved);
    expect(saved).toMatchObject({
      transcriptId,
      answer: "Yes",
      evidence: ["quote one", "quote two"],
      model: "test-model",
      tokensUsed: 120,
    });
  });

  it("returns the newest verdict for a transcript", async () => {
    const analyses = new AnalysisStore(db);
    const transcriptId = await storeTranscript();

    analyses.save(transcriptId, { answer: "No", reasoning: "", evidence: [] });
    const newer = analyses.save(transcriptId, { answer: "Cannot determine", reasoning: "", evidence: [] });

    expect(analyses.latestForTranscript(transcriptId)?.id).toBe(newer.id);
    expect(analyses.latestForVideo(VIDEO_ID)?.answer).toBe("Cannot determine");
  });

  it("stores null for missing model and token count", async () => {
    const analyses = new AnalysisStore(db);
    const saved = analyses.save(await storeTranscript(), { answer: "No", reasoning: "r", evidence: [] });

    expect(analyses.latestForTranscript(saved.transcriptId)).toMatchObject({ model: null, tokensUsed: null });
  });

  it("drops verdicts of a transcript replaced by overwrite", async () => {
    const analyses = new AnalysisStore(db);
    const oldId = await storeTranscript();
    analyses.save(oldId, { answer: "Yes", reasoning: "", evidence: [] });

    const newId = await storeTranscript(true);

    expect(newId).not.toBe(oldId);
    expect(analyses.latestForTranscript(oldId)).toBeNull();
    expect(analyses.latestForVideo(VIDEO_ID)).toBeNull();
  });

  it("reads legacy rows with plain-text evidence", async () => {
    const analyses = new AnalysisStore(db);
    const transcriptId = await storeTranscript();
    db.prepare(
      `INSERT INTO analysis_results (transcript_id, answer, evidence, analysis_date)
       VALUES (?, 'Yes', 'just a sentence', '2024-01-01T00:00:00.000Z')`,
    ).run(transcriptId);

    expect(analyses.latestForTranscript(transcriptId)).toMatchObject({
      answer: "Yes",
      reasoning: "",
      evidence: ["just a sentence"],
    });
  });

  it("returns null when nothing is stored", () => {
    const analyses = new AnalysisStore(db);
    expect(analyses.latestForTranscript(1)).toBeNull();
    expect(analyses.latestForVideo(VIDEO_ID)).toBeNull();
  });
});
