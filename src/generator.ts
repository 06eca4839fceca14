/**
 * End-to-end pipeline: apidoc.js → schema tree → endpoints → OpenAPI document
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { RuntimeConfig } from './config.js';
import { PATH_ITEM_KEYS } from './constants.js';
import { findDuplicatePaths, flattenEndpoints } from './endpoint-flattener.js';
import { FileContentCache } from './file-cache.js';
import { SilentLogger, type Logger } from './logger.js';
import { OpenAPISynthesizer } from './openapi-synthesizer.js';
import { SchemaExtractor, defaultStrategies, type ExtractionResult, type StrategyAttempt } from './schema-extractor.js';
import type { EndpointDescriptor, FidelityTier } from './types/apidoc.js';
import type { ApiProfile } from './types/profile.js';

export interface DocumentSummary {
  paths: number;
  operations: number;
  tags: number;
  securitySchemes: number;
  schemas: number;
}

export interface GenerationResult {
  document: OpenAPIV3.Document;
  endpoints: EndpointDescriptor[];
  tier: FidelityTier;
  attempts: StrategyAttempt[];
  duplicatePaths: string[];
  summary: DocumentSummary;
}

export interface GeneratorOptions {
  logger?: Logger;
  extractor?: SchemaExtractor;
}

export function summarizeDocument(document: OpenAPIV3.Document): DocumentSummary {
  let operations = 0;
  for (const pathItem of Object.values(document.paths)) {
    for (const key of Object.values(PATH_ITEM_KEYS)) {
      if (pathItem?.[key]) operations++;
    }
  }

  return {
    paths: Object.keys(document.paths).length,
    operations,
    tags: document.tags?.length ?? 0,
    securitySchemes: Object.keys(document.components?.securitySchemes ?? {}).length,
    schemas: Object.keys(document.components?.schemas ?? {}).length,
  };
}

/**
 * Extractor wired from runtime configuration
 */
export function createExtractor(config: RuntimeConfig, logger: Logger): SchemaExtractor {
  const evaluator = config.evaluator.enabled
    ? { command: config.evaluator.command, timeoutMs: config.evaluator.timeoutMs, logger }
    : false;

  return new SchemaExtractor({
    strategies: defaultStrategies(evaluator),
    cache: new FileContentCache({ maxEntries: config.cacheMaxEntries }),
    logger,
  });
}

export class ApiDocGenerator {
  private readonly logger: Logger;
  private readonly extractor: SchemaExtractor;
  private readonly synthesizer: OpenAPISynthesizer;

  constructor(
    private readonly profile: ApiProfile,
    options: GeneratorOptions = {}
  ) {
    this.logger = options.logger ?? new SilentLogger();
    this.extractor = options.extractor ?? new SchemaExtractor({ logger: this.logger });
    this.synthesizer = new OpenAPISynthesizer(profile, this.logger);
  }

  async generate(filePath: string): Promise<GenerationResult> {
    this.logger.info('Extracting API schema', { file: filePath, profile: this.profile.name });
    return this.build(await this.extractor.extract(filePath));
  }

  async generateFromSource(content: string): Promise<GenerationResult> {
    return this.build(await this.extractor.extractFromSource(content));
  }

  private build(extraction: ExtractionResult): GenerationResult {
    const { nodes, tier, attempts } = extraction;

    if (tier === 'structural') {
      this.logger.warn('Schema recovered by structural scan only; parameters and responses are not available', {
        failedTiers: attempts.filter((a) => a.error !== undefined).map((a) => a.tier),
      });
    }

    const endpoints = flattenEndpoints(nodes);
    const duplicatePaths = findDuplicatePaths(endpoints);
    this.logger.info('Flattened API endpoints', {
      endpoints: endpoints.length,
      tier,
      duplicatePaths: duplicatePaths.length,
    });

    const document = this.synthesizer.buildDocument(endpoints);
    const summary = summarizeDocument(document);
    this.logger.info('OpenAPI document created', { ...summary });

    return { document, endpoints, tier, attempts, duplicatePaths, summary };
  }
}
