#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Usage: apidoc-openapi <pve|pbs|profile.json> <apidoc.js> <output-dir>
 */

import 'dotenv/config';
import { loadRuntimeConfig } from './config.js';
import { ConfigurationError, getErrorDetails, toError } from './errors.js';
import { ApiDocGenerator, createExtractor } from './generator.js';
import { ConsoleLogger, createLogger, type Logger } from './logger.js';
import { writeDocument } from './output-writer.js';
import { ProfileLoader } from './profile-loader.js';

const USAGE = 'Usage: apidoc-openapi <pve|pbs|path/to/profile.json> <apidoc.js> <output-dir>';

async function main(): Promise<number> {
  let logger: Logger = new ConsoleLogger();

  try {
    const config = loadRuntimeConfig();
    logger = createLogger(config.logFormat, config.logLevel);

    const [profileArg, inputPath, outputDir] = process.argv.slice(2);
    if (!profileArg || !inputPath || !outputDir) {
      throw new ConfigurationError(USAGE);
    }

    const profile = await new ProfileLoader().resolve(profileArg);
    const generator = new ApiDocGenerator(profile, {
      logger,
      extractor: createExtractor(config, logger),
    });

    const result = await generator.generate(inputPath);
    if (result.duplicatePaths.length > 0) {
      logger.warn('Duplicate endpoint paths were overwritten', { paths: result.duplicatePaths });
    }

    const files = await writeDocument(result.document, outputDir, `${profile.name}-api`);
    logger.info('OpenAPI specification written', {
      ...files,
      tier: result.tier,
      endpoints: result.endpoints.length,
      ...result.summary,
    });

    return 0;
  } catch (error) {
    logger.error('Generation failed', toError(error), getErrorDetails(error));
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
