export { TranscriptPipeline, createPipeline } from "./service.js";
export type { TranscriptPipelineDeps, CreatePipelineOptions } from "./service.js";
export { TranscriptAcquirer } from "./acquire.js";
export type { AcquisitionOutcome, TranscriptAcquirerDeps } from "./acquire.js";
export { YouTubeCaptionSource, parseTimedTextPayload } from "./captions.js";
export type { YouTubeCaptionSourceOptions } from "./captions.js";
export { YtDlpSubtitleTool, YtDlpMetadataLookup, createYtDlpRunner, selectSubtitle } from "./ytdlp.js";
export type { ToolRunner, YtDlpOptions } from "./ytdlp.js";
export { CachedMetadataLookup } from "./metadata-cache.js";
export type { CachedMetadataLookupOptions } from "./metadata-cache.js";
export { TranscriptStore, artifactPath, formatTranscript } from "./store.js";
export type { SaveResult, SaveTranscriptOptions, TranscriptStoreOptions } from "./store.js";
export { extractVideoId, parseYouTubeVideoId } from "./parse-url.js";
export { parseCues, timestampToSeconds } from "./vtt.js";
export { normalizeSegment, normalizeSegments } from "./normalize.js";
export type {
  CallOptions,
  CaptionResult,
  CaptionSource,
  FetchFn,
  MetadataLookup,
  SubtitleDownload,
  SubtitleTool,
  TranscriptRecord,
  TranscriptSegment,
  VideoMetadata,
} from "./types.js";
