/**
 * Read File Tool — reads a text file from the working directory and
 * returns its lines numbered, optionally windowed by offset/limit.
 */
import { open, readFile, stat } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

import { get_encoding, type Tiktoken } from 'tiktoken';
import { z } from 'zod';

import type { ToolDefinition, ToolResult } from '@/tools/types.js';
import { toolFailure, toolSuccess } from '@/tools/types.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'read-file' });

// ─── Constants ──────────────────────────────────────────────────

/** Maximum file size accepted (10 MB). */
const MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Output beyond this many tokens is truncated. */
const MAX_OUTPUT_TOKENS = 25_000;

/** Bytes inspected when sniffing for binary content. */
const BINARY_SNIFF_BYTES = 8192;

// ─── Schemas ────────────────────────────────────────────────────

const inputSchema = z.object({
  path: z.string().min(1)
    .describe('The path to the file to read (relative to working directory or absolute path)'),
  offset: z.number().int().min(1).default(1)
    .describe('Line number to start reading from (1-based). Defaults to 1.'),
  limit: z.number().int().min(1).optional()
    .describe('Maximum number of lines to read. If not provided, all lines from the offset will be read.'),
});

// ─── Helpers ────────────────────────────────────────────────────

let encoding: Tiktoken | undefined;

/** Rough token estimate (~4 characters per token), used when the tokenizer is unavailable. */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor(text.length / 4));
}

/** Count tokens with the cl100k_base encoding. */
export function countTokens(text: string): number {
  try {
    encoding ??= get_encoding('cl100k_base');
    return encoding.encode_ordinary(text).length;
  } catch (error) {
    logger.warn('Token counting failed, using character estimate', {
      component: 'read-file',
      error: error instanceof Error ? error.message : String(error),
    });
    return estimateTokens(text);
  }
}

/** Longest prefix of `text` that fits in `targetTokens`. */
function truncateByChars(text: string, targetTokens: number, suffix: string): string {
  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.floor((low + high + 1) / 2);
    if (countTokens(text.slice(0, mid)) <= targetTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return text.slice(0, low) + suffix;
}

/**
 * Cut text down to `maxTokens`, keeping whole lines, and append `suffix`.
 */
export function truncateText(text: string, maxTokens: number, suffix: string): string {
  if (countTokens(text) <= maxTokens) return text;

  const target = maxTokens - countTokens(suffix);
  if (target <= 0) return suffix.trim();

  const kept: string[] = [];
  let used = 0;
  for (const line of text.split('\n')) {
    const lineTokens = countTokens(line + '\n');
    if (used + lineTokens > target) break;
    kept.push(line);
    used += lineTokens;
  }

  // Not even one whole line fits
  if (kept.length === 0) return truncateByChars(text, target, suffix);
  return kept.join('\n') + suffix;
}

async function isBinaryFile(path: string): Promise<boolean> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the read_file tool. */
export function createReadFileTool(): ToolDefinition<typeof inputSchema> {
  return {
    name: 'read_file',
    description:
      'Read the contents of a text file. Returns the file content with line numbers. ' +
      'For large files, use offset and limit to read only a portion of the file. ' +
      'Cannot read binary files (images, executables, etc.).',
    kind: 'read',
    inputSchema,

    async execute({ params, workingDirectory }): Promise<ToolResult> {
      const path = isAbsolute(params.path) ? params.path : resolve(workingDirectory, params.path);

      let size: number;
      try {
        const info = await stat(path);
        if (!info.isFile()) {
          return toolFailure(`Not a file: ${path}`);
        }
        size = info.size;
      } catch {
        return toolFailure(`File not found: ${path}`);
      }

      if (size > MAX_FILE_SIZE) {
        return toolFailure(`File too large (${(size / 1024 / 1024).toFixed(1)} MB): ${path}`);
      }
      if (await isBinaryFile(path)) {
        return toolFailure(`Cannot read binary files: ${path}`);
      }

      const content = await readFile(path, 'utf-8');
      const lines = content.split(/\r?\n/);
      if (lines.at(-1) === '') lines.pop();
      if (lines.length === 0) {
        return toolSuccess('File is empty', { metadata: { lines: 0 } });
      }

      const start = params.offset;
      if (start > lines.length) {
        return toolFailure(`Offset ${start} is beyond the end of the file (${lines.length} lines)`, {
          metadata: { totalLines: lines.length },
        });
      }
      const end = params.limit !== undefined
        ? Math.min(start + params.limit - 1, lines.length)
        : lines.length;

      const numbered = lines
        .slice(start - 1, end)
        .map((line, i) => `${String(start + i).padStart(6)}|${line}`)
        .join('\n');

      const truncated = countTokens(numbered) > MAX_OUTPUT_TOKENS;
      let output = truncated
        ? truncateText(numbered, MAX_OUTPUT_TOKENS, `\n... [truncated. Total line count ${lines.length}]`)
        : numbered;

      if (start > 1 || end < lines.length) {
        output = `Showing lines ${start}-${end} of ${lines.length}\n\n${output}`;
      }

      return toolSuccess(output, {
        truncated,
        metadata: {
          path,
          totalLines: lines.length,
          shownStart: start,
          shownEnd: end,
        },
      });
    },
  };
}
