/**
 * Independent check of a finished document against the OpenAPI schema
 *
 * Load problems (missing file, bad JSON/YAML) and schema violations are
 * reported separately so a broken artifact is not mistaken for a generator bug.
 */

import SwaggerParser from '@apidevtools/swagger-parser';
import fs from 'fs/promises';
import path from 'path';
import type { OpenAPI } from 'openapi-types';
import { parse as parseYaml } from 'yaml';
import { toError } from './errors.js';
import { isRecord } from './types/apidoc.js';

export type ValidationStage = 'load' | 'validation';

export type DocumentValidationResult =
  | { valid: true }
  | { valid: false; stage: ValidationStage; errors: string[] };

function errorMessages(error: unknown): string[] {
  const err = toError(error);
  const details: unknown = Reflect.get(err, 'details');
  if (Array.isArray(details) && details.length > 0) {
    return details.map((detail) => {
      if (!isRecord(detail)) return String(detail);
      const location = typeof detail.instancePath === 'string' && detail.instancePath ? detail.instancePath : '/';
      return `${location}: ${String(detail.message)}`;
    });
  }
  return err.message.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
}

export class DocumentValidator {
  async validateFile(filePath: string): Promise<DocumentValidationResult> {
    const extension = path.extname(filePath).toLowerCase();
    if (!['.json', '.yaml', '.yml'].includes(extension)) {
      return { valid: false, stage: 'load', errors: [`Unsupported file format: ${extension || '(none)'}`] };
    }

    let parsed: unknown;
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      parsed = extension === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      return { valid: false, stage: 'load', errors: [toError(error).message] };
    }

    if (!isRecord(parsed)) {
      return { valid: false, stage: 'load', errors: ['Document root must be an object'] };
    }

    return this.validateDocument(parsed as OpenAPI.Document);
  }

  async validateDocument(document: OpenAPI.Document): Promise<DocumentValidationResult> {
    try {
      // Validation dereferences in place; keep the caller's document intact
      await SwaggerParser.validate(structuredClone(document));
      return { valid: true };
    } catch (error) {
      return { valid: false, stage: 'validation', errors: errorMessages(error) };
    }
  }
}
