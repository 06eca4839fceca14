/**
 * Writes a generated document as JSON and YAML side by side
 */

import fs from 'fs/promises';
import path from 'path';
import type { OpenAPIV3 } from 'openapi-types';
import { stringify as stringifyYaml } from 'yaml';

export interface WrittenFiles {
  json: string;
  yaml: string;
}

export async function writeDocument(
  document: OpenAPIV3.Document,
  outputDir: string,
  baseName: string
): Promise<WrittenFiles> {
  await fs.mkdir(outputDir, { recursive: true });

  const files: WrittenFiles = {
    json: path.join(outputDir, `${baseName}.json`),
    yaml: path.join(outputDir, `${baseName}.yaml`),
  };

  await fs.writeFile(files.json, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  // aliasDuplicateObjects off: shared sub-objects are written out in full, never as &anchors
  await fs.writeFile(files.yaml, stringifyYaml(document, { aliasDuplicateObjects: false, lineWidth: 120 }), 'utf-8');

  return files;
}
