/**
 * Segmented Pipeline Driver
 *
 * Streams one document's pages through extraction and validation while
 * keeping peak memory bounded by the segment size:
 *
 *   Init -> Streaming -> Merging -> Finalizing -> Completed
 *
 * Any stage may throw, which moves the job to Failed. The failure path
 * (error artifact and terminal error record) belongs to the job runner.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/pipeline/driver
 */

import { REQUIRED_FIELDS, CONSISTENCY_FIELDS, type FieldMap, type FieldName } from '../../models/field.js';
import { isCritical, toAnomalyRow, type Anomaly } from '../../models/anomaly.js';
import { RESULT_HEADER, type SegmentRow } from '../../models/segment.js';
import { computePercent } from '../../models/progress.js';
import type { JobResult } from '../../models/job.js';
import { extractFields } from '../extraction/extractor.js';
import { validatePage } from '../extraction/validator.js';
import { runConsistencyChecks } from '../extraction/consistency.js';
import type { BlobSink } from '../storage/blob-sink.js';
import type { CsvRow } from '../storage/csv.js';
import type { PageSource } from '../text/page-source.js';
import type { ProgressLedger } from '../progress/ledger.js';
import { isPersistenceFailure } from '../jobs/errors.js';

export type PipelineStage =
  | 'Init'
  | 'Streaming'
  | 'Merging'
  | 'Finalizing'
  | 'Completed'
  | 'Failed';

export interface PipelineDriverOptions {
  /** Pages per checkpointed segment (default: 4) */
  segmentSize: number;
}

export const DEFAULT_SEGMENT_SIZE = 4;

/** Summary cells written for a field no page recorded */
const NOT_FOUND = 'Not found';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Per-run bookkeeping. Holds only what later stages need: segment
 * locators, anomalies, the consistency fields of each page, and the found
 * values for the summary.
 */
class RunState {
  stage: PipelineStage = 'Init';
  readonly segmentLocators: string[] = [];
  readonly anomalies: Anomaly[] = [];
  readonly consistencyMaps: FieldMap[] = [];
  readonly foundValues = new Map<FieldName, string[]>();
  skippedSegments = 0;

  constructor(readonly jobKey: string) {}

  transition(next: PipelineStage): void {
    console.error(`[Pipeline] ${this.jobKey}: ${this.stage} -> ${next}`);
    this.stage = next;
  }
}

function pickConsistencyFields(fields: FieldMap): FieldMap {
  const reduced: Partial<Record<FieldName, string>> = {};
  for (const field of CONSISTENCY_FIELDS) {
    const value = fields[field];
    if (value !== undefined) reduced[field] = value;
  }
  return reduced;
}

function toResultRow(row: SegmentRow): CsvRow {
  return [row.page, row.field, row.status, row.value];
}

export class SegmentedPipelineDriver {
  private readonly segmentSize: number;

  constructor(
    private readonly sink: BlobSink,
    private readonly ledger: ProgressLedger,
    options?: Partial<PipelineDriverOptions>
  ) {
    const size = options?.segmentSize ?? DEFAULT_SEGMENT_SIZE;
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Segment size must be a positive integer, got ${size}`);
    }
    this.segmentSize = size;
  }

  getSegmentSize(): number {
    return this.segmentSize;
  }

  /**
   * Process every page of the source and finish the job on the ledger.
   *
   * @throws whatever a stage raised; the caller records the failure
   */
  async run(jobKey: string, source: PageSource): Promise<JobResult> {
    const state = new RunState(jobKey);
    try {
      const totalPages = await source.pageCount();

      state.transition('Streaming');
      await this.stream(state, source, totalPages);

      state.transition('Merging');
      const resultLocator = await this.sink.writeFinalArtifact(
        jobKey,
        this.mergeSegments(state),
        RESULT_HEADER
      );
      const partial = state.skippedSegments > 0;

      state.transition('Finalizing');
      const result = await this.finalize(state, totalPages, resultLocator, partial);

      state.transition('Completed');
      return result;
    } catch (error) {
      state.transition('Failed');
      throw error;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STREAMING
  // ═══════════════════════════════════════════════════════════════════════════

  private async stream(state: RunState, source: PageSource, totalPages: number): Promise<void> {
    let buffer: SegmentRow[] = [];
    let pagesInBuffer = 0;

    for (let page = 1; page <= totalPages; page++) {
      const text = await source.getPageText(page);
      const fields = extractFields(text);
      state.anomalies.push(...validatePage(page, fields));

      for (const field of REQUIRED_FIELDS) {
        const value = fields[field];
        if (value === undefined) {
          buffer.push({ page, field, status: 'Missing', value: '' });
        } else {
          buffer.push({ page, field, status: 'Found', value });
          const seen = state.foundValues.get(field);
          if (seen) seen.push(value);
          else state.foundValues.set(field, [value]);
        }
      }
      state.consistencyMaps.push(pickConsistencyFields(fields));
      pagesInBuffer++;

      if (pagesInBuffer === this.segmentSize || page === totalPages) {
        const index = state.segmentLocators.length;
        const locator = await this.sink.writeSegment(state.jobKey, index, buffer);
        state.segmentLocators.push(locator);
        console.error(`[Pipeline] ${state.jobKey}: flushed segment ${index} (${buffer.length} rows)`);
        buffer = [];
        pagesInBuffer = 0;
      }

      // 100% is written once, by the terminal transition
      if (page < totalPages) {
        await this.reportProgress(state.jobKey, computePercent(page, totalPages));
      }
    }
  }

  /**
   * Non-terminal progress. A storage failure here is logged and the job
   * carries on; the next update or the terminal write supersedes it.
   */
  private async reportProgress(jobKey: string, percent: number): Promise<void> {
    try {
      await this.ledger.setProgress(jobKey, { percent });
    } catch (error) {
      if (!isPersistenceFailure(error)) throw error;
      console.error(`[Pipeline] ${jobKey}: progress update to ${percent}% not stored: ${error.message}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // MERGING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Yields the rows of every segment in index order, deleting each segment
   * once consumed. Unreadable segments are skipped and counted.
   */
  private async *mergeSegments(state: RunState): AsyncGenerator<CsvRow> {
    for (const locator of state.segmentLocators) {
      let rows: SegmentRow[];
      try {
        rows = await this.sink.readSegment(locator);
      } catch (error) {
        state.skippedSegments++;
        console.error(`[Pipeline] ${state.jobKey}: skipping unreadable segment ${locator}: ${errorMessage(error)}`);
        continue;
      }

      for (const row of rows) {
        yield toResultRow(row);
      }

      try {
        await this.sink.deleteSegment(locator);
      } catch (error) {
        console.error(`[Pipeline] ${state.jobKey}: could not delete segment ${locator}: ${errorMessage(error)}`);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // FINALIZING
  // ═══════════════════════════════════════════════════════════════════════════

  private async finalize(
    state: RunState,
    totalPages: number,
    resultLocator: string,
    partial: boolean
  ): Promise<JobResult> {
    const { jobKey } = state;
    state.anomalies.push(...runConsistencyChecks(state.consistencyMaps));

    const summaryRows = REQUIRED_FIELDS.map((field): CsvRow => {
      const values = state.foundValues.get(field);
      return values && values.length > 0
        ? [field, 'Found', values.join('; ')]
        : [field, NOT_FOUND, NOT_FOUND];
    });
    const summaryLocator = await this.sink.writeSummaryArtifact(jobKey, summaryRows);
    const anomalyLocator = await this.sink.writeAnomalyReport(
      jobKey,
      state.anomalies.map(toAnomalyRow)
    );

    const stored = await this.ledger.complete(jobKey, resultLocator, partial);
    if (!stored) {
      console.error(`[Pipeline] ${jobKey}: job was already finished, result not recorded`);
    }

    const criticalCount = state.anomalies.filter(isCritical).length;
    console.error(
      `[Pipeline] ${jobKey}: ${totalPages} pages, ${state.segmentLocators.length} segments, ` +
        `${state.anomalies.length} anomalies (${criticalCount} critical)` +
        (partial ? `, ${state.skippedSegments} segments skipped` : '')
    );

    return {
      jobKey,
      totalPages,
      segmentCount: state.segmentLocators.length,
      anomalyCount: state.anomalies.length,
      criticalCount,
      artifacts: { result: resultLocator, summary: summaryLocator, anomalies: anomalyLocator },
      partial,
    };
  }
}
