/**
 * Tests for the OpenAPI validation script
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { validateFiles } from './validate-openapi.js';

const MINIMAL_DOCUMENT = {
  openapi: '3.0.3',
  info: { title: 'Minimal API', version: '1.0.0' },
  paths: {
    '/version': {
      get: { responses: { '200': { description: 'Successful operation' } } },
    },
  },
};

describe('validateFiles', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-openapi-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports each file in order', async () => {
    const good = path.join(tmpDir, 'good.json');
    await fs.writeFile(good, JSON.stringify(MINIMAL_DOCUMENT));
    const unsupported = path.join(tmpDir, 'notes.md');

    const reports = await validateFiles([good, unsupported]);

    expect(reports).toEqual([
      { file: good, valid: true, lines: ['✅ VALID'] },
      {
        file: unsupported,
        valid: false,
        lines: ['❌ COULD NOT LOAD', '  • Unsupported file format: .md'],
      },
    ]);
  });

  it('flags schema violations as invalid', async () => {
    const bad = path.join(tmpDir, 'bad.json');
    await fs.writeFile(bad, JSON.stringify({ ...MINIMAL_DOCUMENT, paths: { version: {} } }));

    const [report] = await validateFiles([bad]);

    expect(report.valid).toBe(false);
    expect(report.lines[0]).toBe('❌ INVALID');
  });
});
