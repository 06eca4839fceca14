/**
 * Text-level conversion of the schema literal into strict JSON
 *
 * No tokenizer: a fixed sequence of regex rewrites, then JSON.parse. Embedded
 * "/.../" regex literals are swapped for placeholder tokens first so the
 * quote and keyword rewrites cannot touch their contents. The rewrites skip
 * double-quoted strings, and text that is already strict JSON is decoded as is.
 *
 * Known limitation: the single-quote rewrite can corrupt single-quoted values that
 * contain unescaped apostrophes next to a colon.
 */

import { NormalizationError, toError } from './errors.js';
import {
  isRecord,
  toNodeList,
  type FidelityTier,
  type ParseStrategy,
  type RawSchemaNode,
  type StrategyInput,
  type StrategyOutcome,
} from './types/apidoc.js';

const REGEX_LITERAL = /"\/[^"]*\/"/g;
const DOUBLE_QUOTED_STRING = /"(?:[^"\\\n]|\\.)*"/;

interface Rewrite {
  pattern: RegExp;
  replace: (match: string, group: string) => string;
}

const REWRITES: readonly Rewrite[] = [
  { pattern: /'([^']*)':/, replace: (_match, key) => `"${key}":` },
  { pattern: /: '([^']*)'/, replace: (_match, value) => `: "${value}"` },
  { pattern: /\btrue\b/, replace: () => 'true' },
  { pattern: /\bfalse\b/, replace: () => 'false' },
  { pattern: /\bnull\b/, replace: () => 'null' },
  { pattern: /\bundefined\b/, replace: () => 'null' },
  { pattern: /,(\s*[}\]])/, replace: (_match, closing) => closing },
];

const PLACEHOLDER_PREFIX = '__REGEX_PATTERN_';

interface ProtectedLiterals {
  text: string;
  originals: Map<string, string>;
}

/**
 * Replace every "/.../" literal with a unique "__REGEX_PATTERN_<n>__" token
 */
export function protectRegexLiterals(text: string): ProtectedLiterals {
  const originals = new Map<string, string>();
  let counter = 0;

  const replaced = text.replace(REGEX_LITERAL, (literal) => {
    const token = `${PLACEHOLDER_PREFIX}${counter++}__`;
    originals.set(token, literal);
    return `"${token}"`;
  });

  return { text: replaced, originals };
}

/**
 * Value a placeholder stands for: the decoded literal, or its raw inner text
 * when the literal is not a valid JSON string
 */
function restoredValue(literal: string): string {
  try {
    const decoded: unknown = JSON.parse(literal);
    return typeof decoded === 'string' ? decoded : literal.slice(1, -1);
  } catch {
    // Escapes such as \d are legal in the source but not in JSON: keep the raw text
    return literal.slice(1, -1);
  }
}

function restorePlaceholders(value: unknown, originals: Map<string, string>): unknown {
  if (typeof value === 'string') {
    const literal = originals.get(value);
    return literal === undefined ? value : restoredValue(literal);
  }

  if (Array.isArray(value)) {
    return value.map((item) => restorePlaceholders(item, originals));
  }

  if (isRecord(value)) {
    const restored: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const literal = originals.get(key);
      restored[literal === undefined ? key : restoredValue(literal)] = restorePlaceholders(item, originals);
    }
    return restored;
  }

  return value;
}

/**
 * Apply one rewrite everywhere outside double-quoted strings
 */
function rewriteOutsideStrings(text: string, rewrite: Rewrite): string {
  const combined = new RegExp(`(${DOUBLE_QUOTED_STRING.source})|${rewrite.pattern.source}`, 'g');
  return text.replace(combined, (match: string, quoted: string | undefined, group: string | undefined) =>
    quoted !== undefined ? quoted : rewrite.replace(match, group ?? '')
  );
}

/**
 * Rewrite the literal's syntax into strict JSON text (placeholders still in place)
 */
export function rewriteToJson(text: string): string {
  return REWRITES.reduce(rewriteOutsideStrings, text);
}

function decodeJson(text: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

/**
 * Decode a schema literal into a value. Throws NormalizationError when the
 * rewritten text still is not JSON.
 */
export function normalizeLiteral(literal: string): unknown {
  const { text, originals } = protectRegexLiterals(literal);

  let decoded = decodeJson(text);
  if (!decoded.ok) {
    decoded = decodeJson(rewriteToJson(text));
  }
  if (!decoded.ok) {
    throw new NormalizationError('normalized', decoded.error.message, {
      placeholders: originals.size,
    });
  }

  return originals.size > 0 ? restorePlaceholders(decoded.value, originals) : decoded.value;
}

export class RegexNormalizer implements ParseStrategy {
  readonly tier: FidelityTier = 'normalized';

  async attempt(input: StrategyInput): Promise<StrategyOutcome> {
    try {
      const nodes: RawSchemaNode[] = toNodeList(normalizeLiteral(input.literal));
      return { ok: true, nodes };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}
