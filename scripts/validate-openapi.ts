#!/usr/bin/env node

/**
 * Validates generated OpenAPI documents (JSON or YAML) against the OpenAPI 3 schema
 *
 * Usage: tsx scripts/validate-openapi.ts <file> [file...]
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { DocumentValidator } from '../src/document-validator.js';
import { toError } from '../src/errors.js';

export interface FileReport {
  file: string;
  valid: boolean;
  lines: string[];
}

export async function validateFiles(files: string[], validator = new DocumentValidator()): Promise<FileReport[]> {
  const reports: FileReport[] = [];

  for (const file of files) {
    const result = await validator.validateFile(file);
    if (result.valid) {
      reports.push({ file, valid: true, lines: ['✅ VALID'] });
      continue;
    }

    const heading = result.stage === 'load' ? '❌ COULD NOT LOAD' : '❌ INVALID';
    reports.push({
      file,
      valid: false,
      lines: [heading, ...result.errors.map((error) => `  • ${error}`)],
    });
  }

  return reports;
}

async function main(): Promise<void> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error('Usage: validate-openapi <file> [file...]');
    process.exit(1);
  }

  try {
    const reports = await validateFiles(files.map((file) => path.resolve(file)));

    console.log('');
    console.log('═══════════════════════════════════════════════════');
    console.log('  OPENAPI DOCUMENT VALIDATION');
    console.log('═══════════════════════════════════════════════════');

    for (const report of reports) {
      console.log('');
      console.log(`File: ${report.file}`);
      for (const line of report.lines) console.log(line);
    }

    console.log('');
    console.log('═══════════════════════════════════════════════════');

    if (reports.some((report) => !report.valid)) {
      process.exit(1);
    }
  } catch (e) {
    console.error('Fatal error:', toError(e).message);
    process.exit(1);
  }
}

// Run if called directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
