/**
 * Library exports for programmatic usage
 */
export { ApiDocGenerator, createExtractor, summarizeDocument } from './generator.js';
export type { DocumentSummary, GenerationResult, GeneratorOptions } from './generator.js';
export { SchemaExtractor, defaultStrategies, locateSchemaLiteral } from './schema-extractor.js';
export type { ExtractionResult, StrategyAttempt } from './schema-extractor.js';
export { ExternalEvaluator, execFileRunner } from './external-evaluator.js';
export type { CommandRunner, CommandResult } from './external-evaluator.js';
export { RegexNormalizer, normalizeLiteral } from './regex-normalizer.js';
export { StructuralScanner, scanEndpoints } from './structural-scanner.js';
export { flattenEndpoints, findDuplicatePaths } from './endpoint-flattener.js';
export { OpenAPISynthesizer } from './openapi-synthesizer.js';
export { buildStandardSchemas, matchStandardSchema, resolvePathParameterSchema } from './schema-registry.js';
export { FileContentCache } from './file-cache.js';
export { ProfileLoader } from './profile-loader.js';
export { loadRuntimeConfig } from './config.js';
export type { RuntimeConfig } from './config.js';
export { writeDocument } from './output-writer.js';
export { DocumentValidator } from './document-validator.js';
export type { DocumentValidationResult } from './document-validator.js';
export { ConsoleLogger, JsonLogger, SilentLogger, LogLevel, createLogger } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
export type { ApiProfile, ApiFamily } from './types/profile.js';
export type { EndpointDescriptor, FidelityTier, MethodDefinition, ParseStrategy, RawSchemaNode } from './types/apidoc.js';
