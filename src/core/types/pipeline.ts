export type PipelineStatus = 'success' | 'partial_failure' | 'failed';

export interface PipelineSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  ingestion: Record<string, boolean>;
  // Candidates detected per protocol this run
  anomalies: Record<string, number>;
  status: PipelineStatus;
  error?: string;
}
