export const transcriptSchema = `
CREATE TABLE IF NOT EXISTS transcripts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  video_id TEXT NOT NULL,
  title TEXT,
  channel TEXT,
  text TEXT NOT NULL,
  language TEXT,
  extraction_date TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_transcripts_video_id
  ON transcripts(video_id, extraction_date);
`;

export const analysisResultSchema = `
CREATE TABLE IF NOT EXISTS analysis_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  transcript_id INTEGER NOT NULL REFERENCES transcripts(id) ON DELETE CASCADE,
  answer TEXT NOT NULL,
  reasoning TEXT,
  evidence TEXT,
  model TEXT,
  tokens_used INTEGER,
  analysis_date TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_analysis_results_transcript_id
  ON analysis_results(transcript_id, analysis_date);
`;

/** Title/channel per video; incomplete lookups are cached too so they are not retried at once. */
export const videoMetadataSchema = `
CREATE TABLE IF NOT EXISTS video_metadata (
  video_id TEXT PRIMARY KEY,
  title TEXT,
  channel TEXT,
  fetch_date TEXT NOT NULL
);
`;

export const allSchemas = [transcriptSchema, analysisResultSchema, videoMetadataSchema];

/** Columns added after the first release; created on open when an older database lacks them. */
export const columnMigrations: { table: string; column: string; type: string }[] = [
  { table: "transcripts", column: "language", type: "TEXT" },
  { table: "analysis_results", column: "reasoning", type: "TEXT" },
  { table: "analysis_results", column: "evidence", type: "TEXT" },
  { table: "analysis_results", column: "model", type: "TEXT" },
  { table: "analysis_results", column: "tokens_used", type: "INTEGER" },
];
