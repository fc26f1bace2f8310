import { z } from "zod";
import type { Db } from "../db/connection.js";
import { StorageError, toErrorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ANSWERS, type AnalysisRecord, type AnalysisVerdict } from "./types.js";

type AnalysisRow = {
  id: number;
  transcript_id: number;
  answer: string;
  reasoning: string | null;
  evidence: string | null;
  model: string | null;
  tokens_used: number | null;
  analysis_date: string;
};

const answerSchema = z.enum(ANSWERS);
const evidenceSchema = z.array(z.string());

const COLUMNS =
  "a.id, a.transcript_id, a.answer, a.reasoning, a.evidence, a.model, a.tokens_used, a.analysis_date";

/** Evidence is stored as a JSON array; older rows may hold a bare string. */
function parseEvidence(raw: string | null): string[] {
  if (!raw) return [];
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return [raw];
  }
  const parsed = evidenceSchema.safeParse(json);
  return parsed.success ? parsed.data : [raw];
}

function toRecord(row: AnalysisRow): AnalysisRecord {
  const answer = answerSchema.safeParse(row.answer);
  if (!answer.success) {
    logger.warn("Stored analysis has an unknown answer", {
      context: "analysis",
      id: row.id,
      answer: row.answer,
    });
  }
  return {
    id: row.id,
    transcriptId: row.transcript_id,
    answer: answer.success ? answer.data : "Cannot determine",
    reasoning: row.reasoning ?? "",
    evidence: parseEvidence(row.evidence),
    model: row.model,
    tokensUsed: row.tokens_used,
    analysisDate: row.analysis_date,
  };
}

/** Verdicts keyed by transcript row; deleting a transcript cascades to its verdicts. */
export class AnalysisStore {
  constructor(private readonly db: Db) {}

  save(transcriptId: number, verdict: AnalysisVerdict): AnalysisRecord {
    const analysisDate = new Date().toISOString();
    try {
      const { lastInsertRowid } = this.db
        .prepare<[number, string, string, string, string | null, number | null, string]>(
          `INSERT INTO analysis_results
             (transcript_id, answer, reasoning, evidence, model, tokens_used, analysis_date)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          transcriptId,
          verdict.answer,
          verdict.reasoning,
          JSON.stringify(verdict.evidence),
          verdict.model ?? null,
          verdict.tokensUsed ?? null,
          analysisDate,
        );
      logger.info("Analysis stored", { context: "analysis", transcriptId, answer: verdict.answer });
      return {
        id: Number(lastInsertRowid),
        transcriptId,
        answer: verdict.answer,
        reasoning: verdict.reasoning,
        evidence: verdict.evidence,
        model: verdict.model ?? null,
        tokensUsed: verdict.tokensUsed ?? null,
        analysisDate,
      };
    } catch (error) {
      logger.error("Failed to store analysis", {
        context: "analysis",
        transcriptId,
        error: toErrorMessage(error),
      });
      throw new StorageError(
        `Failed to store analysis for transcript ${transcriptId}: ${toErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  latestForTranscript(transcriptId: number): AnalysisRecord | null {
    const row = this.query(() =>
      this.db
        .prepare<[number], AnalysisRow>(
          `SELECT ${COLUMNS} FROM analysis_results a WHERE a.transcript_id = ?
           ORDER BY a.analysis_date DESC, a.id DESC LIMIT 1`,
        )
        .get(transcriptId),
    );
    return row ? toRecord(row) : null;
  }

  /** Latest verdict of the video's current (newest) transcript. */
  latestForVideo(videoId: string): AnalysisRecord | null {
    const row = this.query(() =>
      this.db
        .prepare<[string], AnalysisRow>(
          `SELECT ${COLUMNS} FROM analysis_results a
           WHERE a.transcript_id = (
             SELECT t.id FROM transcripts t WHERE t.video_id = ?
             ORDER BY t.extraction_date DESC, t.id DESC LIMIT 1
           )
           ORDER BY a.analysis_date DESC, a.id DESC LIMIT 1`,
        )
        .get(videoId),
    );
    return row ? toRecord(row) : null;
  }

  private query<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new StorageError(`Analysis query failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}
