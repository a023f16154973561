/**
 * Base class for file-based booking sources
 * Reads the whole file on connect and serves the parsed rows from memory
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  IRecordSource,
  ConnectorConfig,
  ConnectionState,
  ReadResult,
  Record,
} from '@termrecon/core';
import { ConnectorError, wrapError } from '@termrecon/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IRecordSource<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _records: Record[] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      await access(this.config.filePath, constants.R_OK);
      this._records = await this.parseFile();
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      throw wrapError(error, this.config.filePath);
    }
  }

  async disconnect(): Promise<void> {
    this._records = [];
    this._state = 'disconnected';
  }

  async readRecords(): Promise<ReadResult> {
    this.ensureConnected();
    return {
      records: [...this._records],
      totalCount: this._records.length,
    };
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: 'Connector is not connected',
        source: this.config.id,
        suggestion: 'Call connect() before reading records.',
      });
    }
  }

  /**
   * Reject header names that would pollute record prototypes
   */
  protected assertSafeHeaders(headers: readonly string[], kind: string): void {
    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe ${kind} header name: ${header}`,
          source: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }
  }

  /** Text content of the file */
  protected async readText(): Promise<string> {
    const content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
    return content.replace(/^\uFEFF/, '');
  }

  /**
   * Read and parse the file into rows (implemented by subclasses)
   */
  protected abstract parseFile(): Promise<Record[]>;
}
