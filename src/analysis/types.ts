import { z } from "zod";
import type { TranscriptRecord } from "../youtube/types.js";

export const ANSWERS = ["Yes", "No", "Cannot determine"] as const;

/** Shape every analyzer must return; validated before anything is stored. */
export const analysisVerdictSchema = z.object({
  answer: z.enum(ANSWERS),
  reasoning: z.string().default(""),
  evidence: z.array(z.string()).default([]),
  model: z.string().optional(),
  tokensUsed: z.number().int().nonnegative().optional(),
});

export type AnalysisVerdict = z.infer<typeof analysisVerdictSchema>;

/**
 * Judges a stored transcript. The implementation (LLM client, prompt, rules) is the caller's;
 * only the verdict shape is fixed.
 */
export interface TranscriptAnalyzer {
  analyze(transcript: TranscriptRecord): Promise<unknown>;
}

export type AnalysisRecord = {
  id: number;
  transcriptId: number;
  answer: AnalysisVerdict["answer"];
  reasoning: string;
  evidence: string[];
  model: string | null;
  tokensUsed: number | null;
  analysisDate: string; // ISO-8601, UTC
};
