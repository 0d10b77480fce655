/**
 * Job interfaces
 *
 * Describes a submitted document and the outcome of validating it.
 */

/**
 * Serializable description of a document's page-text source.
 * Crosses the job queue as JSON, so it carries paths or text, never handles.
 */
export type PageSourceSpec =
  | { type: 'pdf'; path: string }
  | { type: 'text'; path: string }
  | { type: 'inline'; pages: string[] };

/**
 * Locators of every artifact a completed job produces
 */
export interface JobArtifacts {
  result: string;
  summary: string;
  anomalies: string;
}

export interface JobResult {
  jobKey: string;
  totalPages: number;
  segmentCount: number;
  anomalyCount: number;
  criticalCount: number;
  artifacts: JobArtifacts;
  /** True when one or more segments were skipped during merge */
  partial: boolean;
}
