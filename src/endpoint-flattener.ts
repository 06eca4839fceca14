/**
 * Flattening of the schema tree into endpoint descriptors
 */

import { isHttpMethod } from './constants.js';
import { isRecord, type EndpointDescriptor, type MethodDefinition, type RawSchemaNode } from './types/apidoc.js';

function isLeaf(value: unknown): boolean {
  return value === true || value === 1 || value === '1';
}

function describe(fullPath: string, node: RawSchemaNode, methods: Record<string, MethodDefinition>): EndpointDescriptor {
  return {
    fullPath,
    methods,
    text: typeof node.text === 'string' ? node.text : '',
    leaf: isLeaf(node.leaf),
  };
}

function infoMethods(node: RawSchemaNode): Record<string, MethodDefinition> | undefined {
  if (!isRecord(node.info) || Object.keys(node.info).length === 0) return undefined;

  const methods: Record<string, MethodDefinition> = {};
  for (const [verb, definition] of Object.entries(node.info)) {
    if (isRecord(definition)) {
      methods[verb] = definition;
    }
  }
  // May be empty when every entry is malformed; synthesis skips such descriptors
  return methods;
}

function directMethods(node: RawSchemaNode): Record<string, MethodDefinition> | undefined {
  const methods: Record<string, MethodDefinition> = {};
  for (const [key, definition] of Object.entries(node)) {
    if (isHttpMethod(key) && isRecord(definition)) {
      methods[key] = definition;
    }
  }
  return Object.keys(methods).length > 0 ? methods : undefined;
}

/**
 * Pre-order walk producing one descriptor per node that declares methods
 *
 * Paths are joined by plain concatenation (prefix + node.path), never by a
 * separator, so a segment written inconsistently in the source shows up in
 * the output exactly as written. A node with both an `info` map and verb keys
 * of its own yields two descriptors.
 */
export function flattenEndpoints(nodes: readonly unknown[], prefix = ''): EndpointDescriptor[] {
  const endpoints: EndpointDescriptor[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    const fullPath = prefix + (typeof node.path === 'string' ? node.path : '');

    const fromInfo = infoMethods(node);
    if (fromInfo) {
      endpoints.push(describe(fullPath, node, fromInfo));
    }

    const fromKeys = directMethods(node);
    if (fromKeys) {
      endpoints.push(describe(fullPath, node, fromKeys));
    }

    if (Array.isArray(node.children) && node.children.length > 0) {
      endpoints.push(...flattenEndpoints(node.children, fullPath));
    }
  }

  return endpoints;
}

/**
 * Paths that occur more than once, in order of first repetition
 */
export function findDuplicatePaths(endpoints: readonly EndpointDescriptor[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const endpoint of endpoints) {
    if (seen.has(endpoint.fullPath)) {
      duplicates.add(endpoint.fullPath);
    }
    seen.add(endpoint.fullPath);
  }

  return [...duplicates];
}
