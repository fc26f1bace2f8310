import { AnalysisError, toErrorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { TranscriptPipeline } from "../youtube/service.js";
import type { TranscriptRecord } from "../youtube/types.js";
import type { AnalysisStore } from "./store.js";
import { analysisVerdictSchema, type AnalysisRecord, type TranscriptAnalyzer } from "./types.js";

export type AnalysisServiceDeps = {
  pipeline: TranscriptPipeline;
  analyses: AnalysisStore;
  analyzer: TranscriptAnalyzer;
};

export type AnalyzeOptions = {
  /** Re-run the analyzer even when a verdict is stored. */
  force?: boolean;
  /** Re-acquire the transcript; a new transcript row has no cached verdict. */
  overwrite?: boolean;
};

export type AnalysisResult = {
  transcript: TranscriptRecord;
  analysis: AnalysisRecord;
  cached: boolean;
};

export class AnalysisService {
  private readonly pipeline: TranscriptPipeline;
  private readonly analyses: AnalysisStore;
  private readonly analyzer: TranscriptAnalyzer;

  constructor(deps: AnalysisServiceDeps) {
    this.pipeline = deps.pipeline;
    this.analyses = deps.analyses;
    this.analyzer = deps.analyzer;
  }

  async analyze(reference: string, opts: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const transcript = await this.pipeline.acquireTranscript(reference, opts.overwrite ?? false);

    if (!opts.force) {
      const cached = this.analyses.latestForTranscript(transcript.id);
      if (cached) {
        logger.info("Using stored analysis", {
          context: "analysis",
          videoId: transcript.videoId,
          id: cached.id,
        });
        return { transcript, analysis: cached, cached: true };
      }
    }

    let raw: unknown;
    try {
      raw = await this.analyzer.analyze(transcript);
    } catch (error) {
      throw new AnalysisError(transcript.videoId, `Analyzer failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    const verdict = analysisVerdictSchema.safeParse(raw);
    if (!verdict.success) {
      throw new AnalysisError(
        transcript.videoId,
        `Analyzer returned an invalid verdict: ${verdict.error.issues.map((i) => i.message).join("; ")}`,
        { cause: verdict.error },
      );
    }

    const analysis = this.analyses.save(transcript.id, verdict.data);
    return { transcript, analysis, cached: false };
  }
}
