/**
 * Database entities: repositories, commits, analysis_results, ingest_events.
 */
export { SourceRepository } from './source-repository.entity';
export { Commit } from './commit.entity';
export { AnalysisResult } from './analysis-result.entity';
export { IngestEvent } from './ingest-event.entity';
