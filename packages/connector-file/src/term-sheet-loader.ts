/**
 * Term sheet loader
 *
 * Reads the JSON an extraction step produced for a term sheet document and
 * validates it into TermSheetData.
 */

import { readFile } from 'node:fs/promises';
import {
  ConnectorError,
  termSheetSchema,
  wrapError,
  type TermSheetData,
  type TermSheetSource,
} from '@termrecon/core';

/** Top-level groups some extractors nest the terms under */
export const TERM_SHEET_CATEGORIES = [
  'IDENTIFIERS',
  'FINANCIAL TERMS',
  'DATES',
  'PAYMENT TERMS',
  'BOND CHARACTERISTICS',
] as const;

const CODE_FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove a surrounding Markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? (match[1] ?? '').trim() : trimmed;
}

/**
 * Merge category groups into one flat object. Keys outside the categories
 * are kept as they are.
 */
export function flattenTermSheet(data: { [key: string]: unknown }): { [key: string]: unknown } {
  const categories: readonly string[] = TERM_SHEET_CATEGORIES;
  const flat: { [key: string]: unknown } = {};

  for (const [key, value] of Object.entries(data)) {
    if (categories.includes(key) && isPlainObject(value)) {
      Object.assign(flat, value);
    } else if (!categories.includes(key)) {
      flat[key] = value;
    }
  }

  return flat;
}

/**
 * Parse extracted term sheet text
 *
 * @throws ConnectorError VALIDATION_ERROR when the text is not a valid term sheet
 */
export function parseTermSheetJson(text: string, source = 'term sheet'): TermSheetData {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `Term sheet is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      source,
      suggestion: 'Check the extraction output; it must be a JSON object.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isPlainObject(raw)) {
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: 'Term sheet JSON must be an object',
      source,
    });
  }

  const parsed = termSheetSchema.safeParse(flattenTermSheet(raw));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `Invalid term sheet: ${details}`,
      source,
      context: { issues: parsed.error.issues.length },
    });
  }

  return Object.freeze(parsed.data);
}

/**
 * Read and parse a term sheet JSON file
 *
 * @throws ConnectorError NOT_FOUND, READ_FAILED or VALIDATION_ERROR
 */
export async function loadTermSheet(filePath: string): Promise<TermSheetData> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw wrapError(error, filePath);
  }

  return parseTermSheetJson(text.replace(/^\uFEFF/, ''), filePath);
}

/**
 * TermSheetSource backed by a saved extraction result
 */
export class JsonTermSheetSource implements TermSheetSource {
  constructor(private readonly filePath: string) {}

  readTermSheet(): Promise<TermSheetData> {
    return loadTermSheet(this.filePath);
  }
}
