/**
 * Shared component schemas and the rules that decide when to reference them
 *
 * Two ordered rule tables, evaluated top-down with the first match winning:
 * one keyed on path parameter names, one on a parameter's (type, pattern,
 * description) signature. Rules scoped to a family only apply when generating
 * for that family, so a reference never points at a schema the document lacks.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { SCHEMA_REF_PREFIX } from './constants.js';
import type { ApiFamily } from './types/profile.js';

export type StandardSchemaName =
  | 'ProxmoxError'
  | 'ProxmoxTask'
  | 'ProxmoxSuccess'
  | 'ProxmoxNodeId'
  | 'ProxmoxVmId'
  | 'ProxmoxStorageId'
  | 'ProxmoxEmail'
  | 'ProxmoxUserId'
  | 'ProxmoxResourceName'
  | 'ProxmoxSha256'
  | 'ProxmoxBackupId'
  | 'ProxmoxDatastoreName';

export const NODE_PATTERN = '^[a-zA-Z0-9]([a-zA-Z0-9\\-]{0,61}[a-zA-Z0-9])?$';
export const AT_REALM_PATTERN = '^[^@]+@[^@]+$';
export const SHA256_PATTERN = '^[a-f0-9]{64}$';
export const RESOURCE_NAME_PATTERNS: readonly string[] = [
  '^[A-Za-z0-9_][A-Za-z0-9._\\-]*$',
  '^(?:[A-Za-z0-9_][A-Za-z0-9._\\-]*)$',
];

const BACKUP_ONLY: readonly ApiFamily[] = ['backup-server'];

interface StandardSchemaDefinition {
  name: StandardSchemaName;
  schema: OpenAPIV3.SchemaObject;
  families?: readonly ApiFamily[];
}

export const STANDARD_SCHEMAS: readonly StandardSchemaDefinition[] = [
  {
    name: 'ProxmoxError',
    schema: {
      type: 'object',
      description: 'Standard Proxmox API error response',
      properties: {
        data: { type: 'object', nullable: true, description: 'Additional error context data' },
        errors: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Detailed error messages keyed by field or error type',
        },
        message: { type: 'string', description: 'Human-readable error message' },
      },
    },
  },
  {
    name: 'ProxmoxTask',
    schema: {
      type: 'object',
      description: 'Proxmox async task response',
      properties: {
        data: {
          type: 'string',
          description: 'Task ID for tracking async operations',
          pattern: '^UPID:[^:]+:[0-9A-F]+:[^:]*:[^:]+:[^:]*:[^:]*:$',
        },
      },
      required: ['data'],
    },
  },
  {
    name: 'ProxmoxSuccess',
    schema: {
      type: 'object',
      description: 'Standard success response',
      properties: {
        data: { description: 'Response data (varies by endpoint)' },
        success: { type: 'boolean', description: 'Operation success indicator' },
      },
    },
  },
  {
    name: 'ProxmoxNodeId',
    schema: {
      type: 'string',
      description: 'Proxmox node identifier following DNS hostname standards',
      pattern: NODE_PATTERN,
      minLength: 1,
      maxLength: 63,
      example: 'pve-node-01',
    },
  },
  {
    name: 'ProxmoxVmId',
    schema: {
      type: 'integer',
      description: 'Virtual machine or container ID',
      minimum: 1,
      maximum: 999999999,
      example: 100,
    },
  },
  {
    name: 'ProxmoxStorageId',
    schema: {
      type: 'string',
      description: 'Storage identifier',
      pattern: '^[A-Za-z][A-Za-z0-9\\-_]+$',
      minLength: 1,
      maxLength: 64,
      example: 'local-lvm',
    },
  },
  {
    name: 'ProxmoxEmail',
    schema: {
      type: 'string',
      description: 'Email address format',
      pattern: AT_REALM_PATTERN,
      format: 'email',
      example: 'admin@example.com',
    },
  },
  {
    name: 'ProxmoxUserId',
    schema: {
      type: 'string',
      description: 'User ID in format user@realm',
      pattern: AT_REALM_PATTERN,
      example: 'admin@pve',
    },
  },
  {
    name: 'ProxmoxResourceName',
    schema: {
      type: 'string',
      description: 'General resource name following Proxmox naming conventions',
      pattern: RESOURCE_NAME_PATTERNS[0],
      minLength: 1,
      maxLength: 64,
      example: 'my-resource',
    },
  },
  {
    name: 'ProxmoxSha256',
    families: BACKUP_ONLY,
    schema: {
      type: 'string',
      description: 'SHA256 hash for backup integrity verification',
      pattern: SHA256_PATTERN,
      minLength: 64,
      maxLength: 64,
      example: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    },
  },
  {
    name: 'ProxmoxBackupId',
    families: BACKUP_ONLY,
    schema: {
      type: 'string',
      description: 'Backup ID following PBS naming conventions',
      pattern: RESOURCE_NAME_PATTERNS[1],
      example: 'vm-100-disk-0',
    },
  },
  {
    name: 'ProxmoxDatastoreName',
    families: BACKUP_ONLY,
    schema: {
      type: 'string',
      description: 'Datastore name in PBS',
      pattern: RESOURCE_NAME_PATTERNS[0],
      minLength: 1,
      maxLength: 32,
      example: 'backup-storage',
    },
  },
];

function appliesTo(families: readonly ApiFamily[] | undefined, family: ApiFamily): boolean {
  return families === undefined || families.includes(family);
}

export function schemaRef(name: StandardSchemaName): OpenAPIV3.ReferenceObject {
  return { $ref: `${SCHEMA_REF_PREFIX}${name}` };
}

/**
 * components.schemas for a family: the shared set plus the family's additions
 */
export function buildStandardSchemas(family: ApiFamily): Record<string, OpenAPIV3.SchemaObject> {
  const schemas: Record<string, OpenAPIV3.SchemaObject> = {};
  for (const definition of STANDARD_SCHEMAS) {
    if (appliesTo(definition.families, family)) {
      schemas[definition.name] = structuredClone(definition.schema);
    }
  }
  return schemas;
}

interface PathParameterRule {
  names: readonly string[];
  ref: StandardSchemaName;
  families?: readonly ApiFamily[];
}

export const PATH_PARAMETER_RULES: readonly PathParameterRule[] = [
  { names: ['vmid', 'ctid'], ref: 'ProxmoxVmId' },
  { names: ['node'], ref: 'ProxmoxNodeId' },
  { names: ['storage'], ref: 'ProxmoxStorageId' },
  { names: ['userid'], ref: 'ProxmoxUserId' },
  { names: ['datastore', 'store'], ref: 'ProxmoxDatastoreName', families: BACKUP_ONLY },
  { names: ['backup-id', 'backup_id'], ref: 'ProxmoxBackupId', families: BACKUP_ONLY },
  { names: ['digest', 'checksum'], ref: 'ProxmoxSha256', families: BACKUP_ONLY },
  { names: ['poolid', 'realm', 'group', 'role'], ref: 'ProxmoxResourceName' },
];

/**
 * Schema for a `{name}` path parameter, matched by exact name
 */
export function resolvePathParameterSchema(
  name: string,
  family: ApiFamily
): OpenAPIV3.ReferenceObject | OpenAPIV3.SchemaObject {
  const rule = PATH_PARAMETER_RULES.find((r) => appliesTo(r.families, family) && r.names.includes(name));
  return rule ? schemaRef(rule.ref) : { type: 'string', description: `The ${name} parameter` };
}

export interface ParameterSignature {
  type: string;
  /** Pattern with any /.../ delimiters already removed */
  pattern?: string;
  /** Lower-cased description */
  description: string;
  minimum?: number;
  maximum?: number;
}

interface SignatureRule {
  ref: StandardSchemaName;
  families?: readonly ApiFamily[];
  matches(signature: ParameterSignature): boolean;
}

const isResourceName = (signature: ParameterSignature): boolean =>
  signature.pattern !== undefined && RESOURCE_NAME_PATTERNS.includes(signature.pattern);

export const SIGNATURE_RULES: readonly SignatureRule[] = [
  {
    ref: 'ProxmoxNodeId',
    matches: (s) => s.pattern === NODE_PATTERN,
  },
  {
    ref: 'ProxmoxUserId',
    matches: (s) => s.pattern === AT_REALM_PATTERN && s.description.includes('user'),
  },
  {
    ref: 'ProxmoxEmail',
    matches: (s) => s.pattern === AT_REALM_PATTERN && s.description.includes('email'),
  },
  {
    ref: 'ProxmoxVmId',
    matches: (s) => s.type === 'integer' && s.minimum === 1 && (s.maximum ?? 0) > 100000,
  },
  {
    ref: 'ProxmoxSha256',
    families: BACKUP_ONLY,
    matches: (s) => s.pattern === SHA256_PATTERN,
  },
  {
    ref: 'ProxmoxDatastoreName',
    families: BACKUP_ONLY,
    matches: (s) => isResourceName(s) && (s.description.includes('datastore') || s.description.includes('store')),
  },
  {
    ref: 'ProxmoxBackupId',
    families: BACKUP_ONLY,
    matches: (s) => isResourceName(s) && s.description.includes('backup'),
  },
  {
    ref: 'ProxmoxStorageId',
    matches: (s) => isResourceName(s) && s.description.includes('storage'),
  },
  {
    ref: 'ProxmoxResourceName',
    matches: isResourceName,
  },
];

/**
 * Reference to the first standardized schema whose rule matches, if any
 */
export function matchStandardSchema(
  signature: ParameterSignature,
  family: ApiFamily
): OpenAPIV3.ReferenceObject | undefined {
  const rule = SIGNATURE_RULES.find((r) => appliesTo(r.families, family) && r.matches(signature));
  return rule ? schemaRef(rule.ref) : undefined;
}
