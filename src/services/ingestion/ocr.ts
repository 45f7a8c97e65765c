/**
 * OCR preprocessing with ocrmypdf
 *
 * Adds a text layer to scanned PDFs before extraction. Runs the `ocrmypdf`
 * executable; any failure returns null and the original file is used.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/ingestion/ocr
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface OcrPreprocessor {
  isAvailable(): Promise<boolean>;

  /**
   * Write an OCR'd copy of `inputPath` and return its path, or null when
   * preprocessing failed. The caller removes the returned file.
   */
  preprocess(inputPath: string): Promise<string | null>;
}

/**
 * Per-page OCR, used only when document preprocessing was not possible.
 *
 * No implementation ships with the server: the fallback runs only when one
 * is passed to `initializeState({ pageOcr })` or `DocumentIngestor`.
 */
export interface PageOcr {
  recognizePage(filePath: string, pageNum: number): Promise<string>;
}

export interface OcrMyPdfConfig {
  /** Executable name or path */
  command: string;
  /** Tesseract language list */
  languages: string;
  timeoutMs: number;
  /** Timeout of the `--version` probe */
  probeTimeoutMs: number;
}

const DEFAULT_CONFIG: OcrMyPdfConfig = {
  command: 'ocrmypdf',
  languages: 'deu+eng',
  timeoutMs: 300_000,
  probeTimeoutMs: 5_000,
};

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

/** Temp directory prefix for OCR output */
export const OCR_TEMP_PREFIX = 'pdf-pipeline-ocr-';

interface RunResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

function runCommand(command: string, args: string[], timeoutMs: number): Promise<RunResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { timeout: timeoutMs });
    let stdout = '';
    let stderr = '';
    let settled = false;

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on('data', (data: Buffer) => {
      if (stderr.length < MAX_STDERR_LENGTH) {
        stderr += data.toString();
      }
    });

    proc.on('error', (error) => {
      if (settled) return;
      settled = true;
      resolve({ code: null, signal: null, stdout, stderr, error });
    });

    proc.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ code, signal, stdout, stderr });
    });
  });
}

export class OcrMyPdfPreprocessor implements OcrPreprocessor {
  private readonly config: OcrMyPdfConfig;
  private available: boolean | null = null;

  constructor(config: Partial<OcrMyPdfConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async isAvailable(): Promise<boolean> {
    if (this.available !== null) return this.available;

    const result = await runCommand(this.config.command, ['--version'], this.config.probeTimeoutMs);
    this.available = result.error === undefined && result.code === 0;
    if (this.available) {
      console.error(`[OCR] ocrmypdf available: ${result.stdout.trim()}`);
    } else {
      console.error('[OCR] ocrmypdf not installed, document-level OCR disabled');
    }
    return this.available;
  }

  async preprocess(inputPath: string): Promise<string | null> {
    const outputDir = fs.mkdtempSync(path.join(os.tmpdir(), OCR_TEMP_PREFIX));
    const outputPath = path.join(outputDir, 'ocr.pdf');

    console.error(`[OCR] Running ocrmypdf on ${path.basename(inputPath)}`);
    const result = await runCommand(
      this.config.command,
      [
        '--skip-text',
        '-l',
        this.config.languages,
        '--deskew',
        '--optimize',
        '1',
        '--quiet',
        inputPath,
        outputPath,
      ],
      this.config.timeoutMs
    );

    if (result.error === undefined && result.code === 0 && fs.existsSync(outputPath)) {
      console.error('[OCR] ocrmypdf completed');
      return outputPath;
    }

    if (result.error) {
      console.error(`[OCR] ocrmypdf failed to start: ${result.error.message}`);
    } else if (result.signal) {
      console.error(`[OCR] ocrmypdf killed by ${result.signal} (timeout: ${this.config.timeoutMs}ms)`);
    } else {
      console.error(`[OCR] ocrmypdf exited with code ${result.code}: ${result.stderr.slice(0, 2000)}`);
    }
    removeOcrOutput(outputPath);
    return null;
  }
}

/**
 * Remove an OCR output file and its temp directory
 */
export function removeOcrOutput(outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!path.basename(dir).startsWith(OCR_TEMP_PREFIX)) {
    fs.rmSync(outputPath, { force: true });
    return;
  }
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch (error) {
    console.error(
      `[OCR] Failed to clean up ${outputPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
