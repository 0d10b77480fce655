/**
 * Page-Text Providers
 *
 * A page source hands the pipeline one page of text at a time. OCR and
 * rendering live outside this module; an empty string means the page
 * produced no text and every field on it is recorded missing.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/text/page-source
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import type { PageSourceSpec } from '../../models/job.js';
import { DependencyUnavailableError, ExtractionFailureError } from '../jobs/errors.js';

export interface PageSource {
  pageCount(): Promise<number>;
  /** Text of a 1-based page */
  getPageText(pageIndex: number): Promise<string>;
  close(): Promise<void>;
}

function assertPageIndex(pageIndex: number, total: number): void {
  if (!Number.isInteger(pageIndex) || pageIndex < 1 || pageIndex > total) {
    throw new ExtractionFailureError(
      `Page ${pageIndex} is out of bounds (document has ${total} pages)`,
      pageIndex
    );
  }
}

/**
 * Pages held in memory
 */
export class InlinePageSource implements PageSource {
  constructor(private readonly pages: readonly string[]) {}

  async pageCount(): Promise<number> {
    return this.pages.length;
  }

  async getPageText(pageIndex: number): Promise<string> {
    assertPageIndex(pageIndex, this.pages.length);
    return this.pages[pageIndex - 1];
  }

  async close(): Promise<void> {}
}

/**
 * Split text on form feeds. The empty page after a final form feed is dropped.
 */
export function splitPages(content: string): string[] {
  if (content.length === 0) return [];
  const pages = content.split('\f');
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') {
    pages.pop();
  }
  return pages;
}

/**
 * UTF-8 text file with form-feed page breaks, as written by pdftotext
 */
export class TextFilePageSource implements PageSource {
  private pages: string[] | null = null;

  constructor(private readonly filePath: string) {}

  async pageCount(): Promise<number> {
    return (await this.load()).length;
  }

  async getPageText(pageIndex: number): Promise<string> {
    const pages = await this.load();
    assertPageIndex(pageIndex, pages.length);
    return pages[pageIndex - 1];
  }

  async close(): Promise<void> {
    this.pages = null;
  }

  private async load(): Promise<string[]> {
    if (this.pages) return this.pages;
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ExtractionFailureError(
        `Cannot read text file ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        null,
        { cause: error }
      );
    }
    this.pages = splitPages(content);
    return this.pages;
  }
}

export interface PdfTextOptions {
  /** pdftotext binary (default: 'pdftotext') */
  pdftotextPath: string;
  /** pdfinfo binary (default: 'pdfinfo') */
  pdfinfoPath: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

const DEFAULT_PDF_OPTIONS: PdfTextOptions = {
  pdftotextPath: 'pdftotext',
  pdfinfoPath: 'pdfinfo',
  timeoutMs: 30000,
};

function isSpawnNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Run a command and return its stdout. Spawn errors are rejected as-is so
 * the caller can tell a missing binary from a failed run.
 */
function runCommand(cmd: string, args: string[], timeout: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { timeout });
    let stdout = '';
    let stderr = '';
    let settled = false;
    let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

    const cleanup = () => {
      if (sigkillTimer) {
        clearTimeout(sigkillTimer);
        sigkillTimer = null;
      }
    };

    proc.stdout.setEncoding('utf-8');
    proc.stdout.on('data', (d: string) => {
      stdout += d;
    });
    proc.stderr.on('data', (d) => {
      if (stderr.length < 10240) stderr += d;
    });

    proc.on('error', (err) => {
      cleanup();
      if (settled) return;
      settled = true;
      reject(err);
    });

    proc.on('close', (code, signal) => {
      cleanup();
      if (settled) return;
      settled = true;

      if (signal === 'SIGTERM' || signal === 'SIGKILL') {
        reject(new Error(`Process killed by ${signal} (timeout: ${timeout}ms)`));
        return;
      }

      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(stderr.trim() || `Exit code ${code}`));
      }
    });

    // SIGKILL escalation if SIGTERM doesn't exit within 5s
    if (timeout > 0) {
      sigkillTimer = setTimeout(() => {
        if (!proc.killed) {
          console.error(
            `[PdfTextPageSource] ${cmd} did not exit after SIGTERM, sending SIGKILL (pid: ${proc.pid})`
          );
          proc.kill('SIGKILL');
        }
        if (!settled) {
          settled = true;
          reject(new Error(`Process killed by SIGKILL after timeout (${timeout}ms + 5s grace)`));
        }
      }, timeout + 5000);
      sigkillTimer.unref();
    }
  });
}

/**
 * PDF text layer via poppler's pdftotext, one process per page so that only
 * the current page's text is held in memory.
 */
export class PdfTextPageSource implements PageSource {
  private readonly options: PdfTextOptions;
  private total: number | null = null;

  constructor(
    private readonly filePath: string,
    options?: Partial<PdfTextOptions>
  ) {
    this.options = { ...DEFAULT_PDF_OPTIONS, ...options };
  }

  async pageCount(): Promise<number> {
    if (this.total !== null) return this.total;
    const info = await this.run(this.options.pdfinfoPath, [this.filePath], null);
    const match = /^Pages:\s+(\d+)\s*$/m.exec(info);
    if (!match) {
      throw new ExtractionFailureError(`pdfinfo reported no page count for ${this.filePath}`, null);
    }
    this.total = Number(match[1]);
    return this.total;
  }

  async getPageText(pageIndex: number): Promise<string> {
    assertPageIndex(pageIndex, await this.pageCount());
    const page = String(pageIndex);
    const text = await this.run(
      this.options.pdftotextPath,
      ['-f', page, '-l', page, '-layout', this.filePath, '-'],
      pageIndex
    );
    // pdftotext ends every page with a form feed
    return text.replace(/\f$/, '');
  }

  async close(): Promise<void> {}

  private async run(cmd: string, args: string[], pageIndex: number | null): Promise<string> {
    try {
      return await runCommand(cmd, args, this.options.timeoutMs);
    } catch (error) {
      if (isSpawnNotFound(error)) {
        throw new DependencyUnavailableError(
          `PDF text backend unavailable: "${cmd}" was not found. Install poppler-utils or set PDFTOTEXT_PATH / PDFINFO_PATH.`,
          cmd,
          { cause: error }
        );
      }
      throw new ExtractionFailureError(
        `${cmd} failed for ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        pageIndex,
        { cause: error }
      );
    }
  }
}

/**
 * Check whether a binary can be spawned at all
 */
export async function isCommandAvailable(cmd: string): Promise<boolean> {
  try {
    await runCommand(cmd, ['-v'], 5000);
    return true;
  } catch (error) {
    // Any failure other than "not found" means the binary exists
    return !isSpawnNotFound(error);
  }
}

/**
 * Open the page source a PageSourceSpec describes
 */
export function openPageSource(spec: PageSourceSpec, pdfOptions?: Partial<PdfTextOptions>): PageSource {
  switch (spec.type) {
    case 'inline':
      return new InlinePageSource(spec.pages);
    case 'text':
      return new TextFilePageSource(spec.path);
    case 'pdf':
      return new PdfTextPageSource(spec.path, pdfOptions);
  }
}
