/**
 * Tests for OpenAPI document validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DocumentValidator } from './document-validator.js';
import { ApiDocGenerator } from './generator.js';
import { writeDocument } from './output-writer.js';
import { ProfileLoader } from './profile-loader.js';
import { SchemaExtractor, defaultStrategies } from './schema-extractor.js';
import { SAMPLE_APIDOC_SOURCE, UNDECODABLE_APIDOC_SOURCE } from './testing/fixtures.js';

async function generate(profileName: 'pve' | 'pbs', source: string) {
  const profile = await new ProfileLoader().loadBuiltin(profileName);
  const generator = new ApiDocGenerator(profile, {
    extractor: new SchemaExtractor({ strategies: defaultStrategies(false) }),
  });
  return (await generator.generateFromSource(source)).document;
}

describe('DocumentValidator', () => {
  const validator = new DocumentValidator();
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'document-validator-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('accepts generated documents for both families', async () => {
    expect(await validator.validateDocument(await generate('pve', SAMPLE_APIDOC_SOURCE))).toEqual({ valid: true });
    expect(await validator.validateDocument(await generate('pbs', SAMPLE_APIDOC_SOURCE))).toEqual({ valid: true });
  });

  it('accepts a document recovered by the structural scan', async () => {
    expect(await validator.validateDocument(await generate('pve', UNDECODABLE_APIDOC_SOURCE))).toEqual({
      valid: true,
    });
  });

  it('leaves the given document untouched', async () => {
    const document = await generate('pve', SAMPLE_APIDOC_SOURCE);
    const before = structuredClone(document);

    await validator.validateDocument(document);

    expect(document).toEqual(before);
  });

  it('reports schema violations', async () => {
    const result = await validator.validateDocument({
      openapi: '3.0.3',
      info: { title: 'Missing version', version: '' },
      paths: { 'no-leading-slash': {} },
    });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.stage).toBe('validation');
    expect(result.errors.length).toBeGreaterThan(0);
  });

  it('validates written JSON and YAML files', async () => {
    const files = await writeDocument(await generate('pbs', SAMPLE_APIDOC_SOURCE), tmpDir, 'pbs-api');

    expect(await validator.validateFile(files.json)).toEqual({ valid: true });
    expect(await validator.validateFile(files.yaml)).toEqual({ valid: true });
  });

  it('reports load failures separately', async () => {
    const broken = path.join(tmpDir, 'broken.json');
    await fs.writeFile(broken, '{"openapi": ');
    const list = path.join(tmpDir, 'list.json');
    await fs.writeFile(list, '[1, 2]');

    expect(await validator.validateFile(path.join(tmpDir, 'notes.txt'))).toEqual({
      valid: false,
      stage: 'load',
      errors: ['Unsupported file format: .txt'],
    });
    expect(await validator.validateFile(path.join(tmpDir, 'missing.json'))).toMatchObject({
      valid: false,
      stage: 'load',
    });
    expect(await validator.validateFile(broken)).toMatchObject({ valid: false, stage: 'load' });
    expect(await validator.validateFile(list)).toEqual({
      valid: false,
      stage: 'load',
      errors: ['Document root must be an object'],
    });
  });
});
