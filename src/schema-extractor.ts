/**
 * Schema literal extraction and the fallback parsing chain
 *
 * apidoc.js assigns one huge array literal to `apiSchema`. The literal is cut
 * out by bracket counting, then handed to each strategy in turn until one
 * produces a tree.
 */

import { StructuralError, toError } from './errors.js';
import { ExternalEvaluator, type ExternalEvaluatorOptions } from './external-evaluator.js';
import { FileContentCache } from './file-cache.js';
import { SilentLogger, type Logger } from './logger.js';
import { RegexNormalizer } from './regex-normalizer.js';
import { StructuralScanner } from './structural-scanner.js';
import type { FidelityTier, ParseStrategy, RawSchemaNode, StrategyOutcome } from './types/apidoc.js';

const SCHEMA_ANCHOR = /\b(?:var|const|let)\s+apiSchema\s*=\s*\[/;

export interface LocatedLiteral {
  literal: string;
  /** Offset of the opening "[" */
  start: number;
  /** Offset just past the matching "]" */
  end: number;
}

export interface StrategyAttempt {
  tier: FidelityTier;
  error?: string;
}

export interface ExtractionResult {
  nodes: RawSchemaNode[];
  tier: FidelityTier;
  attempts: StrategyAttempt[];
  literalLength: number;
}

export interface SchemaExtractorOptions {
  strategies?: ParseStrategy[];
  cache?: FileContentCache;
  logger?: Logger;
}

/**
 * Find the apiSchema assignment and return the exact top-level array literal
 *
 * Throws StructuralError when the anchor or the matching "]" is missing.
 */
export function locateSchemaLiteral(content: string): LocatedLiteral {
  const anchor = SCHEMA_ANCHOR.exec(content);
  if (!anchor) {
    throw new StructuralError('Could not find apiSchema start');
  }

  const start = anchor.index + anchor[0].length - 1;
  let depth = 0;

  for (let i = start; i < content.length; i++) {
    const char = content[i];
    if (char === '[') {
      depth++;
    } else if (char === ']') {
      depth--;
      if (depth === 0) {
        return { literal: content.slice(start, i + 1), start, end: i + 1 };
      }
    }
  }

  throw new StructuralError('Could not find apiSchema end', { start, unclosed: depth });
}

/**
 * The standard chain: evaluator (unless disabled), normalizer, scanner
 */
export function defaultStrategies(evaluator: ExternalEvaluatorOptions | false = {}): ParseStrategy[] {
  const strategies: ParseStrategy[] = [new RegexNormalizer(), new StructuralScanner()];
  return evaluator === false ? strategies : [new ExternalEvaluator(evaluator), ...strategies];
}

export class SchemaExtractor {
  private readonly strategies: ParseStrategy[];
  private readonly cache: FileContentCache;
  private readonly logger: Logger;

  constructor(options: SchemaExtractorOptions = {}) {
    this.logger = options.logger ?? new SilentLogger();
    this.strategies = options.strategies ?? defaultStrategies({ logger: this.logger });
    this.cache = options.cache ?? new FileContentCache();
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    const content = await this.cache.getOrLoad(filePath);
    return this.extractFromSource(content);
  }

  /**
   * Run the strategy chain; the first success wins, otherwise the last error is thrown
   */
  async extractFromSource(content: string): Promise<ExtractionResult> {
    const { literal } = locateSchemaLiteral(content);
    const attempts: StrategyAttempt[] = [];
    let lastError: Error = new StructuralError('No parsing strategies configured');

    for (const strategy of this.strategies) {
      let outcome: StrategyOutcome;
      try {
        outcome = await strategy.attempt({ literal });
      } catch (error) {
        outcome = { ok: false, error: toError(error) };
      }

      if (outcome.ok) {
        attempts.push({ tier: strategy.tier });
        this.logger.debug('Schema literal recovered', {
          tier: strategy.tier,
          topLevelNodes: outcome.nodes.length,
        });
        return { nodes: outcome.nodes, tier: strategy.tier, attempts, literalLength: literal.length };
      }

      lastError = outcome.error;
      attempts.push({ tier: strategy.tier, error: outcome.error.message });
      this.logger.debug('Parsing strategy failed, trying next', {
        tier: strategy.tier,
        error: outcome.error.message,
      });
    }

    throw lastError;
  }
}
