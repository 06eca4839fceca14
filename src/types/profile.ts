/**
 * API family profile types
 *
 * A profile carries everything that differs between the Proxmox products:
 * document metadata, server address, security schemes and tag names. The
 * generator itself holds no product-specific strings.
 */

import type { OpenAPIV3 } from 'openapi-types';

/**
 * Backup-server documents get the datastore, backup id and digest schemas
 */
export type ApiFamily = 'virtual-environment' | 'backup-server';

export interface ApiProfile {
  name: string;
  family: ApiFamily;
  title: string;
  description: string;
  version: string;
  default_port: number;
  server_path: string;
  server_description: string;
  host_description: string;
  auth_schemes: Record<string, AuthScheme>;
  tag_mapping: Record<string, string>;
  contact_email: string;
  contact_name?: string;
  contact_url?: string;
  license?: LicenseInfo;
  security_patterns: SecurityPattern[];
}

export type AuthScheme = OpenAPIV3.ApiKeySecurityScheme | OpenAPIV3.HttpSecurityScheme;

/**
 * One alternative of the security requirement list: scheme name → scopes
 */
export type SecurityPattern = Record<string, string[]>;

export interface LicenseInfo {
  name: string;
  url?: string;
}

export const BUILTIN_PROFILES = ['pve', 'pbs'] as const;

export type BuiltinProfileName = (typeof BUILTIN_PROFILES)[number];
