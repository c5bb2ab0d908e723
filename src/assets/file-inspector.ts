import { createHash } from 'node:crypto';
import type { Stats } from 'node:fs';
import { open, readFile, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { AssetContext, AssetEntry, AssetInspector } from '../engine/types.js';
import { errorMessage } from '../lib/json.js';
import { abortReason } from '../lib/sleep.js';
import { summarizeSlides, summarizeWordDocument, summarizeWorkbook } from './office.js';
import { assetTypeFor, type AssetType } from './registry.js';

export type FileInspectorOptions = {
  // Text files above this size are previewed from their head only.
  maxTextBytes?: number;
  previewLines?: number;
};

const DEFAULT_MAX_TEXT_BYTES = 2 * 1024 * 1024;
const HEAD_BYTES = 64 * 1024;

export function assetIdFor(path: string): string {
  return `asset_${createHash('sha256').update(path).digest('hex').slice(0, 12)}`;
}

export function fingerprintOf(path: string, size: number, mtimeMs: number): string {
  return `${path}:${size}:${Math.trunc(mtimeMs)}`;
}

async function readHead(path: string, bytes: number): Promise<string> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await handle.read(buffer, 0, bytes, 0);
    return buffer.subarray(0, bytesRead).toString('utf8');
  } finally {
    await handle.close();
  }
}

function splitCsvHeader(line: string): string[] {
  const columns: string[] = [];
  let current = '';
  let quoted = false;
  for (const char of line) {
    if (char === '"') {
      quoted = !quoted;
    } else if (char === ',' && !quoted) {
      columns.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  columns.push(current.trim());
  return columns.filter(Boolean);
}

/**
 * Describes local files for planning: type, size and a light content summary. Entries whose file is
 * unchanged since they were built (same fingerprint) are reused as they are.
 */
export class FileAssetInspector implements AssetInspector {
  private readonly maxTextBytes: number;
  private readonly previewLines: number;

  constructor(options: FileInspectorOptions = {}) {
    this.maxTextBytes = options.maxTextBytes ?? DEFAULT_MAX_TEXT_BYTES;
    this.previewLines = options.previewLines ?? 5;
  }

  async inspect(paths: string[], cached: AssetEntry[], signal?: AbortSignal): Promise<AssetEntry[]> {
    const entries: AssetEntry[] = [];
    for (const rawPath of paths) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      entries.push(await this.inspectOne(resolve(rawPath), cached));
    }
    return entries;
  }

  private async inspectOne(path: string, cached: AssetEntry[]): Promise<AssetEntry> {
    let info: Stats;
    try {
      info = await stat(path);
    } catch (error) {
      throw new Error(`asset not readable: ${path}: ${errorMessage(error)}`);
    }
    if (!info.isFile()) {
      throw new Error(`asset is not a file: ${path}`);
    }

    const fingerprint = fingerprintOf(path, info.size, info.mtimeMs);
    const previous = cached.find((entry) => entry.path === path);
    if (previous && previous.context.metadata.fingerprint === fingerprint) {
      return previous;
    }

    const type = assetTypeFor(path);
    const base = {
      role: type.role,
      size_bytes: info.size,
      modified_at: info.mtime.toISOString(),
      fingerprint
    };

    let details: { description: string; metadata: Record<string, unknown> };
    try {
      details = await this.describe(path, type, info.size);
    } catch (error) {
      details = {
        description: `${type.label} (${info.size} bytes); contents could not be summarized: ${errorMessage(error)}`,
        metadata: {}
      };
    }

    const context: AssetContext = {
      description: details.description,
      file_name: basename(path),
      file_type: type.fileType,
      metadata: { ...base, ...details.metadata }
    };
    return { assetId: assetIdFor(path), path, context };
  }

  private async describe(path: string, type: AssetType, size: number): Promise<{ description: string; metadata: Record<string, unknown> }> {
    switch (type.format) {
      case 'csv': {
        const { text, complete } = await this.readText(path, size);
        const lines = text.split(/\r?\n/).filter((line) => line.trim());
        const columns = splitCsvHeader(lines[0] ?? '');
        const rows = complete ? Math.max(lines.length - 1, 0) : null;
        return {
          description: `${type.label} with ${rows ?? 'an unknown number of'} rows and ${columns.length} columns: ${columns.join(', ')}`,
          metadata: { columns, row_count: rows, preview: lines.slice(0, this.previewLines + 1) }
        };
      }
      case 'text':
      case 'code': {
        const { text, complete } = await this.readText(path, size);
        const lines = text.replace(/\r?\n$/, '').split(/\r?\n/);
        const lineCount = complete ? lines.length : null;
        return {
          description: `${type.label} with ${lineCount ?? 'an unknown number of'} lines`,
          metadata: { line_count: lineCount, preview: lines.slice(0, this.previewLines) }
        };
      }
      case 'workbook': {
        const { sheets } = await summarizeWorkbook(await readFile(path));
        return {
          description: `${type.label} with ${sheets.length} sheet${sheets.length === 1 ? '' : 's'}: ${sheets.join(', ')}`,
          metadata: { sheets }
        };
      }
      case 'slides': {
        const { slideCount, firstSlideText } = await summarizeSlides(await readFile(path));
        return {
          description: `${type.label} with ${slideCount} slide${slideCount === 1 ? '' : 's'}`,
          metadata: { slide_count: slideCount, first_slide_text: firstSlideText }
        };
      }
      case 'word': {
        const { wordCount, preview } = await summarizeWordDocument(await readFile(path));
        return {
          description: `${type.label} with about ${wordCount} words`,
          metadata: { word_count: wordCount, preview }
        };
      }
      case 'pdf':
      case 'legacy-binary':
      case 'other':
        return { description: `${type.label} (${size} bytes)`, metadata: {} };
    }
  }

  private async readText(path: string, size: number): Promise<{ text: string; complete: boolean }> {
    if (size <= this.maxTextBytes) {
      return { text: await readFile(path, 'utf8'), complete: true };
    }
    return { text: await readHead(path, HEAD_BYTES), complete: false };
  }
}
