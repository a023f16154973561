/**
 * JSON Connector
 * Reads booking records from JSON documents
 */

import type { Record } from '@termrecon/core';
import { ConnectorError } from '@termrecon/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /**
   * Dot path to the records array (e.g. 'data.items'). Without it the root
   * array is used, else a `trades` or `records` array, else the root object
   * as a single record.
   */
  recordsPath?: string;
}

/** Keys searched, in order, when the root is an object and no path is given */
export const DEFAULT_RECORD_KEYS = ['trades', 'records'] as const;

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function isPlainObject(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSafePath(path: string, sourceId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      source: sourceId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        source: sourceId,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string, sourceId: string): unknown {
  let current = obj;

  for (const part of parseSafePath(path, sourceId)) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

export class JsonConnector extends BaseFileConnector<JsonConnectorConfig> {
  private _skipped = 0;

  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  /** Array entries dropped on the last connect because they were not objects */
  get skippedCount(): number {
    return this._skipped;
  }

  protected async parseFile(): Promise<Record[]> {
    const content = await this.readText();

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        source: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = this.locateRows(parsed);
    const records = rows.filter(isPlainObject);
    this._skipped = rows.length - records.length;
    return records;
  }

  private locateRows(parsed: unknown): unknown[] {
    if (this.config.recordsPath) {
      const rows = getNestedValue(parsed, this.config.recordsPath, this.config.id);
      if (!Array.isArray(rows)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Path '${this.config.recordsPath}' does not contain an array`,
          source: this.config.id,
          suggestion: 'Check that recordsPath points to an array of objects.',
        });
      }
      return rows;
    }

    if (Array.isArray(parsed)) {
      return parsed;
    }

    if (isPlainObject(parsed)) {
      for (const key of DEFAULT_RECORD_KEYS) {
        const rows = parsed[key];
        if (Array.isArray(rows)) return rows;
      }
      return [parsed];
    }

    throw new ConnectorError({
      code: 'SCHEMA_MISMATCH',
      message: 'JSON file holds neither an array nor an object of records',
      source: this.config.id,
      suggestion: 'Provide an array of trades, an object with a "trades" array, or set recordsPath.',
    });
  }
}

/**
 * Factory function to create a JSON connector
 */
export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
