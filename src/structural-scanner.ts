/**
 * Last-resort recovery by brace matching
 *
 * When no tier can decode the literal, this still finds each "path" entry and
 * the verbs declared on its object. Only the presence of a verb is recovered;
 * method bodies (parameters, returns, permissions) are not parsed.
 */

import { HTTP_METHODS, isHttpMethod, type HttpMethod } from './constants.js';
import { NormalizationError } from './errors.js';
import type { FidelityTier, ParseStrategy, RawSchemaNode, StrategyInput, StrategyOutcome } from './types/apidoc.js';

const PATH_ENTRY = /"path"\s*:\s*"([^"]+)"/g;
const METHOD_KEY = new RegExp(`"(${HTTP_METHODS.join('|')})"\\s*:\\s*\\{`, 'y');

// Object → "info" → verb. Deeper verbs belong to child nodes.
const MAX_METHOD_DEPTH = 2;

export interface ScannedEndpoint {
  path: string;
  methods: HttpMethod[];
}

/**
 * Offset of the nearest unmatched "{" before `from`, or -1
 */
export function findEnclosingObjectStart(text: string, from: number): number {
  let depth = 0;
  for (let i = from - 1; i >= 0; i--) {
    const char = text[i];
    if (char === '}') {
      depth++;
    } else if (char === '{') {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}

/**
 * Offset just past the "}" matching the "{" at `start`; end of text when unbalanced
 */
export function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return text.length;
}

function methodsInObject(objectText: string): HttpMethod[] {
  const found = new Set<HttpMethod>();
  let depth = 0;

  for (let i = 0; i < objectText.length; i++) {
    const char = objectText[i];
    if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
    } else if (char === '"' && depth <= MAX_METHOD_DEPTH) {
      METHOD_KEY.lastIndex = i;
      const method = METHOD_KEY.exec(objectText)?.[1];
      if (method !== undefined && isHttpMethod(method)) {
        found.add(method);
      }
    }
  }

  return HTTP_METHODS.filter((method) => found.has(method));
}

/**
 * Every "path" entry with the verbs found on its innermost enclosing object
 */
export function scanEndpoints(text: string): ScannedEndpoint[] {
  const endpoints: ScannedEndpoint[] = [];

  for (const match of text.matchAll(PATH_ENTRY)) {
    const offset = match.index ?? 0;
    const start = findEnclosingObjectStart(text, offset);
    if (start === -1) continue;

    const methods = methodsInObject(text.slice(start, findObjectEnd(text, start)));
    if (methods.length > 0) {
      endpoints.push({ path: match[1], methods });
    }
  }

  return endpoints;
}

export class StructuralScanner implements ParseStrategy {
  readonly tier: FidelityTier = 'structural';

  async attempt(input: StrategyInput): Promise<StrategyOutcome> {
    const endpoints = scanEndpoints(input.literal);
    if (endpoints.length === 0) {
      return {
        ok: false,
        error: new NormalizationError('structural', 'no path entries with HTTP methods found'),
      };
    }

    const children: RawSchemaNode[] = endpoints.map(({ path, methods }) => ({
      path,
      text: path,
      leaf: 1,
      info: Object.fromEntries(methods.map((method) => [method, { description: `${method} ${path}` }])),
    }));

    return { ok: true, nodes: [{ text: 'root', children }] };
  }
}
