/**
 * Tests for literal extraction and the strategy chain
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ExternalToolUnavailableError, NormalizationError, StructuralError } from './errors.js';
import type { CommandRunner } from './external-evaluator.js';
import { FileContentCache } from './file-cache.js';
import { SchemaExtractor, defaultStrategies, locateSchemaLiteral } from './schema-extractor.js';
import { SAMPLE_APIDOC_SOURCE, UNDECODABLE_APIDOC_SOURCE } from './testing/fixtures.js';
import type { FidelityTier, ParseStrategy, RawSchemaNode, StrategyOutcome } from './types/apidoc.js';

function fixedStrategy(tier: FidelityTier, result: RawSchemaNode[] | Error): ParseStrategy {
  return {
    tier,
    attempt: vi.fn(
      async (): Promise<StrategyOutcome> =>
        result instanceof Error ? { ok: false, error: result } : { ok: true, nodes: result }
    ),
  };
}

describe('locateSchemaLiteral', () => {
  it('returns the exact top-level array literal', () => {
    const content = 'var x = [0];\nconst apiSchema = [{"path": "/a", "list": [1, [2]]}];\nrender(apiSchema);';
    const located = locateSchemaLiteral(content);

    expect(located.literal).toBe('[{"path": "/a", "list": [1, [2]]}]');
    expect(content.slice(located.start, located.end)).toBe(located.literal);
  });

  it('accepts var, let and const declarations', () => {
    expect(locateSchemaLiteral('var apiSchema=[]').literal).toBe('[]');
    expect(locateSchemaLiteral('let  apiSchema =\n[1]').literal).toBe('[1]');
  });

  it('throws StructuralError without the anchor', () => {
    expect(() => locateSchemaLiteral('const otherSchema = [];')).toThrow(StructuralError);
    expect(() => locateSchemaLiteral('const otherSchema = [];')).toThrow('Could not find apiSchema start');
  });

  it('throws StructuralError when the array never closes', () => {
    expect(() => locateSchemaLiteral('const apiSchema = [{"a": [1]}')).toThrow('Could not find apiSchema end');
  });
});

describe('defaultStrategies', () => {
  it('orders the tiers from highest fidelity down', () => {
    expect(defaultStrategies().map((s) => s.tier)).toEqual(['evaluated', 'normalized', 'structural']);
  });

  it('leaves out the evaluator when disabled', () => {
    expect(defaultStrategies(false).map((s) => s.tier)).toEqual(['normalized', 'structural']);
  });
});

describe('SchemaExtractor', () => {
  it('stops at the first successful strategy', async () => {
    const first = fixedStrategy('evaluated', [{ path: '/a' }]);
    const second = fixedStrategy('normalized', [{ path: '/b' }]);
    const extractor = new SchemaExtractor({ strategies: [first, second] });

    const result = await extractor.extractFromSource('const apiSchema = [];');

    expect(result).toEqual({
      nodes: [{ path: '/a' }],
      tier: 'evaluated',
      attempts: [{ tier: 'evaluated' }],
      literalLength: 2,
    });
    expect(second.attempt).not.toHaveBeenCalled();
  });

  it('records failed tiers before the one that succeeded', async () => {
    const extractor = new SchemaExtractor({
      strategies: [
        fixedStrategy('evaluated', new ExternalToolUnavailableError('node')),
        fixedStrategy('normalized', [{ path: '/b' }]),
      ],
    });

    const result = await extractor.extractFromSource('const apiSchema = [];');

    expect(result.tier).toBe('normalized');
    expect(result.attempts).toEqual([
      { tier: 'evaluated', error: "External interpreter 'node' is not available" },
      { tier: 'normalized' },
    ]);
  });

  it('treats a throwing strategy as a failed one', async () => {
    const throwing: ParseStrategy = {
      tier: 'evaluated',
      attempt: async () => {
        throw new Error('unexpected');
      },
    };
    const extractor = new SchemaExtractor({ strategies: [throwing, fixedStrategy('structural', [])] });

    const result = await extractor.extractFromSource('const apiSchema = [];');

    expect(result.tier).toBe('structural');
    expect(result.attempts[0]).toEqual({ tier: 'evaluated', error: 'unexpected' });
  });

  it('throws the last error when every strategy fails', async () => {
    const lastError = new NormalizationError('structural', 'no path entries with HTTP methods found');
    const extractor = new SchemaExtractor({
      strategies: [fixedStrategy('normalized', new Error('first')), fixedStrategy('structural', lastError)],
    });

    await expect(extractor.extractFromSource('const apiSchema = [];')).rejects.toBe(lastError);
  });

  it('propagates StructuralError without trying any strategy', async () => {
    const strategy = fixedStrategy('normalized', []);
    const extractor = new SchemaExtractor({ strategies: [strategy] });

    await expect(extractor.extractFromSource('no schema here')).rejects.toBeInstanceOf(StructuralError);
    expect(strategy.attempt).not.toHaveBeenCalled();
  });

  it('fails when no strategies are configured', async () => {
    const extractor = new SchemaExtractor({ strategies: [] });

    await expect(extractor.extractFromSource('const apiSchema = [];')).rejects.toThrow('No parsing strategies configured');
  });

  it('falls back to the normalizer when the interpreter is missing', async () => {
    const runner: CommandRunner = async (command) => {
      throw new ExternalToolUnavailableError(command);
    };
    const extractor = new SchemaExtractor({ strategies: defaultStrategies({ command: 'missing', runner }) });

    const result = await extractor.extractFromSource(SAMPLE_APIDOC_SOURCE);

    expect(result.tier).toBe('normalized');
    expect(result.nodes).toHaveLength(2);
  });

  it('falls back to the structural scan for undecodable sources', async () => {
    const extractor = new SchemaExtractor({ strategies: defaultStrategies(false) });

    const result = await extractor.extractFromSource(UNDECODABLE_APIDOC_SOURCE);

    expect(result.tier).toBe('structural');
    expect(result.attempts.map((a) => a.tier)).toEqual(['normalized', 'structural']);
    expect(result.attempts[0].error).toMatch(/^normalized tier failed: /);
  });

  describe('extract', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'schema-extractor-test-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('reads the file through the cache', async () => {
      const file = path.join(tmpDir, 'apidoc.js');
      await fs.writeFile(file, SAMPLE_APIDOC_SOURCE, 'utf-8');
      const cache = new FileContentCache();
      const extractor = new SchemaExtractor({ strategies: defaultStrategies(false), cache });

      const result = await extractor.extract(file);

      expect(result.tier).toBe('normalized');
      expect(cache.has(file)).toBe(true);
    });
  });
});
