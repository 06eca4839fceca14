/**
 * Profile loader and validator
 *
 * Profiles are user-editable JSON. Invalid ones are rejected up front with the
 * zod issue list instead of surfacing as a broken document later.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { ValidationError, toError } from './errors.js';
import { BUILTIN_PROFILES, type ApiProfile, type BuiltinProfileName } from './types/profile.js';

const apiKeySchemeSchema = z.object({
  type: z.literal('apiKey'),
  in: z.enum(['header', 'query', 'cookie']),
  name: z.string().min(1),
  description: z.string().optional(),
});

const httpSchemeSchema = z.object({
  type: z.literal('http'),
  scheme: z.string().min(1),
  bearerFormat: z.string().optional(),
  description: z.string().optional(),
});

export const profileSchema = z.object({
  name: z.string().min(1),
  family: z.enum(['virtual-environment', 'backup-server']),
  title: z.string().min(1),
  description: z.string(),
  version: z.string().min(1),
  default_port: z.number().int().min(1).max(65535),
  server_path: z.string().refine((value) => value === '' || value.startsWith('/'), {
    message: 'server_path must be empty or start with "/"',
  }),
  server_description: z.string(),
  host_description: z.string(),
  auth_schemes: z.record(z.discriminatedUnion('type', [apiKeySchemeSchema, httpSchemeSchema])),
  tag_mapping: z.record(z.string()),
  contact_email: z.string().email(),
  contact_name: z.string().optional(),
  contact_url: z.string().url().optional(),
  license: z
    .object({
      name: z.string().min(1),
      url: z.string().url().optional(),
    })
    .optional(),
  security_patterns: z.array(z.record(z.array(z.string()))),
});

const BUILTIN_DIR = new URL('../profiles/', import.meta.url);

export function isBuiltinProfile(name: string): name is BuiltinProfileName {
  return (BUILTIN_PROFILES as readonly string[]).includes(name);
}

export class ProfileLoader {
  async load(profilePath: string | URL): Promise<ApiProfile> {
    const content = await fs.readFile(profilePath, 'utf-8');

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Profile is not valid JSON: ${String(profilePath)}`, {
        profilePath: String(profilePath),
        reason: toError(error).message,
      });
    }

    return this.parse(json);
  }

  async loadBuiltin(name: BuiltinProfileName): Promise<ApiProfile> {
    return this.load(new URL(`${name}.json`, BUILTIN_DIR));
  }

  /**
   * Resolve either a built-in profile name or a path to a profile file
   */
  async resolve(nameOrPath: string): Promise<ApiProfile> {
    const key = nameOrPath.toLowerCase();
    return isBuiltinProfile(key) ? this.loadBuiltin(key) : this.load(nameOrPath);
  }

  parse(json: unknown): ApiProfile {
    const result = profileSchema.safeParse(json);
    if (!result.success) {
      throw new ValidationError('Invalid profile', {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    const profile: ApiProfile = result.data;
    this.validateLogic(profile);
    return profile;
  }

  /**
   * Rules zod cannot express: every security requirement must name a defined scheme
   */
  private validateLogic(profile: ApiProfile): void {
    const defined = Object.keys(profile.auth_schemes);
    for (const pattern of profile.security_patterns) {
      for (const schemeName of Object.keys(pattern)) {
        if (!defined.includes(schemeName)) {
          throw new ValidationError(
            `Security pattern references undefined scheme '${schemeName}' in profile '${profile.name}'`,
            { profile: profile.name, schemeName, availableSchemes: defined }
          );
        }
      }
    }
  }
}
