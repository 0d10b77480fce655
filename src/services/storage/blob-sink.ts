/**
 * Durable Blob Sink
 *
 * Stores segment checkpoints and the artifacts of a validation job. Locators
 * are opaque to callers; the filesystem sink uses file names relative to its
 * base directory.
 *
 * Every write goes to a temporary file that is renamed into place, so a
 * reader (including the ledger's reconciliation check) only ever sees a
 * complete artifact.
 *
 * @module services/storage/blob-sink
 */

import { promises as fs, createWriteStream } from 'fs';
import { basename, join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { REQUIRED_FIELDS } from '../../models/field.js';
import { ANOMALY_HEADER, SUMMARY_HEADER, type SegmentRow } from '../../models/segment.js';
import { PersistenceFailureError } from '../jobs/errors.js';
import { formatCsvRow, type CsvRow } from './csv.js';

export type ArtifactKind = 'result' | 'summary' | 'anomalies' | 'error';

export type RowSource = Iterable<CsvRow> | AsyncIterable<CsvRow>;

export interface BlobSink {
  writeSegment(jobKey: string, segmentIndex: number, rows: readonly SegmentRow[]): Promise<string>;
  readSegment(locator: string): Promise<SegmentRow[]>;
  deleteSegment(locator: string): Promise<void>;
  /** Streams rows under a header row into the job's final artifact */
  writeFinalArtifact(jobKey: string, rows: RowSource, header: readonly string[]): Promise<string>;
  writeSummaryArtifact(jobKey: string, rows: RowSource): Promise<string>;
  writeAnomalyReport(jobKey: string, rows: RowSource): Promise<string>;
  writeErrorArtifact(jobKey: string, message: string, trace: readonly string[]): Promise<string>;
  /** Locator an artifact of this kind has for the job, whether or not it exists yet */
  locatorFor(jobKey: string, kind: ArtifactKind): string;
  exists(locator: string): Promise<boolean>;
}

const ARTIFACT_SUFFIX: Record<ArtifactKind, string> = {
  result: '_validation_summary.csv',
  summary: '_field_info_summary.csv',
  anomalies: '_anomalies.csv',
  error: '_validation_error.csv',
};

export function segmentLocator(jobKey: string, segmentIndex: number): string {
  return `${jobKey}_segment_${segmentIndex}_validation_summary.jsonl`;
}

const SegmentRowSchema = z.object({
  page: z.number().int().min(1),
  field: z.enum(REQUIRED_FIELDS),
  status: z.enum(['Found', 'Missing']),
  value: z.string(),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function* toLines(header: CsvRow | null, rows: RowSource): AsyncGenerator<string> {
  if (header) yield formatCsvRow(header);
  for await (const row of rows) {
    yield formatCsvRow(row);
  }
}

/**
 * Filesystem-backed blob sink
 */
export class FileSystemBlobSink implements BlobSink {
  constructor(private readonly basePath: string) {}

  getBasePath(): string {
    return this.basePath;
  }

  locatorFor(jobKey: string, kind: ArtifactKind): string {
    return `${jobKey}${ARTIFACT_SUFFIX[kind]}`;
  }

  async writeSegment(
    jobKey: string,
    segmentIndex: number,
    rows: readonly SegmentRow[]
  ): Promise<string> {
    const locator = segmentLocator(jobKey, segmentIndex);
    const lines = rows.map((row) => JSON.stringify(row) + '\n');
    await this.writeAtomic(locator, Readable.from(lines), 'writeSegment');
    return locator;
  }

  async readSegment(locator: string): Promise<SegmentRow[]> {
    const content = await fs.readFile(this.resolve(locator), 'utf-8');
    return content
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line, idx) => {
        const parsed = SegmentRowSchema.safeParse(JSON.parse(line));
        if (!parsed.success) {
          throw new Error(`Malformed row ${idx + 1} in segment ${locator}: ${parsed.error.message}`);
        }
        return parsed.data;
      });
  }

  async deleteSegment(locator: string): Promise<void> {
    await fs.rm(this.resolve(locator), { force: true });
  }

  async writeFinalArtifact(
    jobKey: string,
    rows: RowSource,
    header: readonly string[]
  ): Promise<string> {
    return this.writeCsv(this.locatorFor(jobKey, 'result'), header, rows, 'writeFinalArtifact');
  }

  async writeSummaryArtifact(jobKey: string, rows: RowSource): Promise<string> {
    return this.writeCsv(
      this.locatorFor(jobKey, 'summary'),
      SUMMARY_HEADER,
      rows,
      'writeSummaryArtifact'
    );
  }

  async writeAnomalyReport(jobKey: string, rows: RowSource): Promise<string> {
    return this.writeCsv(
      this.locatorFor(jobKey, 'anomalies'),
      ANOMALY_HEADER,
      rows,
      'writeAnomalyReport'
    );
  }

  async writeErrorArtifact(jobKey: string, message: string, trace: readonly string[]): Promise<string> {
    const rows: CsvRow[] = [[message], ['Traceback:'], ...trace.map((line) => [line])];
    return this.writeCsv(this.locatorFor(jobKey, 'error'), ['Error'], rows, 'writeErrorArtifact');
  }

  async exists(locator: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(locator));
      return stat.isFile();
    } catch {
      // Missing file or invalid locator: not reachable
      return false;
    }
  }

  private async writeCsv(
    locator: string,
    header: CsvRow,
    rows: RowSource,
    operation: string
  ): Promise<string> {
    await this.writeAtomic(locator, Readable.from(toLines(header, rows)), operation);
    return locator;
  }

  private async writeAtomic(locator: string, content: Readable, operation: string): Promise<void> {
    const target = this.resolve(locator);
    const tempPath = `${target}.${uuidv4()}.tmp`;
    try {
      await fs.mkdir(this.basePath, { recursive: true });
      await pipeline(content, createWriteStream(tempPath, { encoding: 'utf-8' }));
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((rmError: unknown) => {
        console.error(`[BlobSink] Could not remove ${tempPath}: ${errorMessage(rmError)}`);
      });
      throw new PersistenceFailureError(
        `Failed to write ${locator}: ${errorMessage(error)}`,
        operation,
        { cause: error }
      );
    }
  }

  /**
   * Resolve a locator to a path inside the base directory.
   * Locators are bare file names; anything with a directory part is rejected.
   */
  private resolve(locator: string): string {
    if (!locator || basename(locator) !== locator || locator === '.' || locator === '..') {
      throw new Error(`Invalid artifact locator: ${locator}`);
    }
    return join(this.basePath, locator);
  }
}
