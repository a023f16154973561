import { describe, expect, it, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('expandEnvVars', () => {
  it('substitutes variables in nested strings', () => {
    const env = { REPORT_DIR: 'reports' };

    expect(
      expandEnvVars({ output: { dir: '${REPORT_DIR}', formats: ['csv'] }, n: 3 }, { env })
    ).toEqual({ output: { dir: 'reports', formats: ['csv'] }, n: 3 });
  });

  it('uses defaults for unset or empty variables', () => {
    expect(expandEnvVars('${REPORT_DIR:-outputs}', { env: {} })).toBe('outputs');
    expect(expandEnvVars('${REPORT_DIR:-outputs}', { env: { REPORT_DIR: '' } })).toBe('outputs');
  });

  it('fails on missing variables unless allowed', () => {
    expect(() => expandEnvVars('${REPORT_DIR}', { env: {} })).toThrow(
      'Missing required environment variable: REPORT_DIR'
    );
    expect(expandEnvVars('${REPORT_DIR}', { env: {}, allowMissing: true })).toBe('${REPORT_DIR}');
  });
});

describe('parseConfig', () => {
  it('accepts an empty object', () => {
    expect(parseConfig({})).toEqual({});
  });

  it('accepts every section', () => {
    const config = parseConfig({
      reconciliation: { numericTolerance: 0.01, fieldTypes: { tenor: 'exact' } },
      output: { dir: 'out', formats: ['markdown'] },
      bookings: { sheet: 'Trades' },
      logging: { level: 'debug', format: 'json' },
    });

    expect(config.reconciliation?.numericTolerance).toBe(0.01);
    expect(config.output?.formats).toEqual(['markdown']);
    expect(config.bookings?.sheet).toBe('Trades');
    expect(config.logging?.format).toBe('json');
  });

  it('rejects unknown report formats', () => {
    expect(() => parseConfig({ output: { formats: ['pdf'] } })).toThrow(/- output\.formats\.0: /);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ extra: true })).toThrow(
      "Invalid config.json:\n- (root): Unrecognized key(s) in object: 'extra'"
    );
  });

  it('rejects negative tolerances', () => {
    expect(() => parseConfig({ reconciliation: { dateToleranceDays: -1 } })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  it('reads a file with a UTF-8 BOM', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'termrecon-config-'));
    const configPath = join(tmpDir, 'config.json');
    writeFileSync(configPath, '﻿{"output": {"dir": "reports"}}', 'utf-8');

    const config = await loadConfig(configPath);

    expect(config.output?.dir).toBe('reports');
  });

  it('reports invalid JSON as a ConfigError', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'termrecon-config-'));
    const configPath = join(tmpDir, 'config.json');
    writeFileSync(configPath, '{"output": ', 'utf-8');

    await expect(loadConfig(configPath)).rejects.toThrow(/^Invalid JSON in /);
  });
});
