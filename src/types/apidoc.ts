/**
 * Types for the schema tree embedded in apidoc.js
 *
 * The tree is recovered from loosely-formed source text, so every field is
 * typed as unknown and narrowed where it is consumed. A malformed field must
 * degrade in place rather than reject the whole document.
 */

export interface RawSchemaNode {
  path?: unknown;
  text?: unknown;
  leaf?: unknown;
  children?: unknown;
  info?: unknown;
  [key: string]: unknown;
}

/**
 * One verb's definition: description, parameters, returns, permissions, allowtoken
 */
export interface MethodDefinition {
  description?: unknown;
  parameters?: unknown;
  returns?: unknown;
  permissions?: unknown;
  allowtoken?: unknown;
  [key: string]: unknown;
}

export interface EndpointDescriptor {
  /** Concatenation of every ancestor's path segment, exactly as written */
  fullPath: string;
  methods: Record<string, MethodDefinition>;
  text: string;
  leaf: boolean;
}

/**
 * Which parsing strategy produced the tree, in decreasing order of completeness
 */
export type FidelityTier = 'evaluated' | 'normalized' | 'structural';

export interface StrategyInput {
  /** Exact text of the top-level array literal */
  literal: string;
}

export type StrategyOutcome =
  | { ok: true; nodes: RawSchemaNode[] }
  | { ok: false; error: Error };

export interface ParseStrategy {
  readonly tier: FidelityTier;
  attempt(input: StrategyInput): Promise<StrategyOutcome>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only object entries of a decoded top-level value
 */
export function toNodeList(value: unknown): RawSchemaNode[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  return isRecord(value) ? [value] : [];
}
