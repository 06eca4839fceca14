/**
 * OpenAPI 3.0.3 document synthesis from endpoint descriptors
 *
 * A malformed field never aborts synthesis: an uncompilable pattern is dropped,
 * an unknown type becomes a described string, a non-numeric bound is skipped.
 */

import type { OpenAPIV3 } from 'openapi-types';
import {
  DEFAULTS,
  ERROR_RESPONSES,
  OPENAPI_VERSION,
  PATH_ITEM_KEYS,
  QUERY_PARAMETER_METHODS,
  isHttpMethod,
  type HttpMethod,
} from './constants.js';
import { ValidationError, toError } from './errors.js';
import { SilentLogger, type Logger } from './logger.js';
import {
  buildStandardSchemas,
  matchStandardSchema,
  resolvePathParameterSchema,
  schemaRef,
} from './schema-registry.js';
import { isRecord, type EndpointDescriptor, type MethodDefinition } from './types/apidoc.js';
import type { ApiProfile } from './types/profile.js';

type SchemaOrRef = OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;

const PATH_PARAMETER = /\{([^}]+)\}/g;
const BOUND_KEYS = ['minLength', 'maxLength', 'minimum', 'maximum'] as const;

interface ConvertedParameter {
  name: string;
  schema: SchemaOrRef;
  required: boolean;
  description?: string;
}

/**
 * `{name}` tokens of a path, left to right
 */
export function extractPathParameters(path: string): string[] {
  return Array.from(path.matchAll(PATH_PARAMETER), (match) => match[1]);
}

/**
 * `get /nodes/{node}/status` → `get_nodes_node_status`
 */
export function operationIdFor(method: string, path: string): string {
  const flattened = path.replace(/\//g, '_').replace(/[{}]/g, '').replace(/^_+|_+$/g, '');
  return `${method.toLowerCase()}_${flattened}`;
}

/**
 * Upper-case the first letter of every alphabetic run, lower-case the rest
 */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Strip `/.../` or `"/.../"` delimiters from a declared pattern
 */
export function unwrapPattern(raw: unknown): string | undefined {
  if (typeof raw !== 'string') return undefined;
  if (raw.length >= 2 && raw.startsWith('/') && raw.endsWith('/')) {
    return raw.slice(1, -1);
  }
  if (raw.length >= 4 && raw.startsWith('"/') && raw.endsWith('/"')) {
    return raw.slice(2, -2);
  }
  return raw;
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export class OpenAPISynthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly profile: ApiProfile,
    logger?: Logger
  ) {
    this.logger = logger ?? new SilentLogger();
  }

  /**
   * Assemble the full document. Later descriptors for the same path replace
   * earlier ones; each replacement is reported as a warning.
   */
  buildDocument(endpoints: readonly EndpointDescriptor[]): OpenAPIV3.Document {
    const paths: OpenAPIV3.PathsObject = {};

    for (const endpoint of endpoints) {
      if (!isRecord(endpoint.methods) || Object.keys(endpoint.methods).length === 0) continue;

      const pathItem = this.convertEndpoint(endpoint);
      if (Object.keys(pathItem).length === 0) continue;

      if (paths[endpoint.fullPath]) {
        this.logger.warn('Duplicate path overwrites earlier definition', { path: endpoint.fullPath });
      }
      paths[endpoint.fullPath] = pathItem;
    }

    const document: OpenAPIV3.Document = {
      openapi: OPENAPI_VERSION,
      info: this.buildInfo(),
      servers: this.buildServers(),
      tags: this.collectTags(paths),
      paths,
      components: {
        securitySchemes: structuredClone(this.profile.auth_schemes),
        schemas: buildStandardSchemas(this.profile.family),
      },
    };

    if (this.profile.security_patterns.length > 0) {
      document.security = structuredClone(this.profile.security_patterns);
    }

    return document;
  }

  /**
   * One operation per recognized verb. Callers must filter out descriptors
   * without a method map.
   */
  convertEndpoint(endpoint: EndpointDescriptor): OpenAPIV3.PathItemObject {
    if (!isRecord(endpoint.methods)) {
      throw new ValidationError(`Endpoint '${endpoint.fullPath}' has no method map`, {
        path: endpoint.fullPath,
      });
    }

    const pathItem: OpenAPIV3.PathItemObject = {};

    for (const [verb, definition] of Object.entries(endpoint.methods)) {
      const method = verb.toUpperCase();
      if (!isHttpMethod(method) || !isRecord(definition)) {
        this.logger.debug('Skipping unrecognized method entry', { path: endpoint.fullPath, method: verb });
        continue;
      }

      pathItem[PATH_ITEM_KEYS[method]] = this.buildOperation(verb, method, endpoint.fullPath, definition);
    }

    return pathItem;
  }

  determineTag(path: string): string {
    const first = path.replace(/^\/+|\/+$/g, '').split('/')[0];
    if (!first) return 'Default';
    return Object.hasOwn(this.profile.tag_mapping, first) ? this.profile.tag_mapping[first] : titleCase(first);
  }

  private buildOperation(
    verb: string,
    method: HttpMethod,
    path: string,
    definition: MethodDefinition
  ): OpenAPIV3.OperationObject {
    const description = typeof definition.description === 'string' ? definition.description : undefined;

    const pathParams = extractPathParameters(path);
    const parameters: OpenAPIV3.ParameterObject[] = pathParams.map((name) => ({
      name,
      in: 'path',
      required: true,
      schema: resolvePathParameterSchema(name, this.profile.family),
      description: `The ${name} parameter`,
    }));

    const declared = this.convertParameters(definition.parameters).filter((p) => !pathParams.includes(p.name));

    let requestBody: OpenAPIV3.RequestBodyObject | undefined;
    if (QUERY_PARAMETER_METHODS.includes(method)) {
      for (const param of declared) {
        const query: OpenAPIV3.ParameterObject = {
          name: param.name,
          in: 'query',
          required: param.required,
          schema: param.schema,
        };
        if (param.description !== undefined) {
          query.description = param.description;
        }
        parameters.push(query);
      }
    } else if (declared.length > 0) {
      requestBody = this.buildRequestBody(declared);
    }

    const operation: OpenAPIV3.OperationObject = {
      summary: description ?? `${verb} ${path}`,
      description: description ?? '',
      operationId: operationIdFor(method, path),
      tags: [this.determineTag(path)],
      ...(parameters.length > 0 ? { parameters } : {}),
      ...(requestBody ? { requestBody } : {}),
      responses: this.buildResponses(definition.returns),
    };

    if (this.profile.security_patterns.length > 0) {
      operation.security = structuredClone(this.profile.security_patterns);
    }

    return operation;
  }

  private buildRequestBody(declared: ConvertedParameter[]): OpenAPIV3.RequestBodyObject {
    const properties: Record<string, SchemaOrRef> = {};
    const required: string[] = [];

    for (const param of declared) {
      properties[param.name] = param.schema;
      if (param.required) {
        required.push(param.name);
      }
    }

    const schema: OpenAPIV3.SchemaObject = { type: 'object', properties };
    if (required.length > 0) {
      schema.required = required;
    }

    return {
      required: required.length > 0,
      content: { 'application/json': { schema } },
    };
  }

  /**
   * Declared parameters in source order; a parameter is required unless marked optional
   */
  private convertParameters(parameters: unknown): ConvertedParameter[] {
    if (!isRecord(parameters) || !isRecord(parameters.properties)) return [];

    const converted: ConvertedParameter[] = [];
    for (const [name, info] of Object.entries(parameters.properties)) {
      if (!isRecord(info)) continue;

      converted.push({
        name,
        schema: this.buildParameterSchema(name, info),
        required: !info.optional,
        description: typeof info.description === 'string' ? info.description : undefined,
      });
    }
    return converted;
  }

  private buildParameterSchema(name: string, info: Record<string, unknown>): SchemaOrRef {
    const typeName = typeof info.type === 'string' ? info.type : 'string';

    const standard = this.standardReference(typeName, info);
    if (standard) return standard;

    const schema = this.primitiveSchema(typeName, info.format);

    if (typeof info.description === 'string') {
      schema.description = info.description;
    }

    for (const key of BOUND_KEYS) {
      const bound = finiteNumber(info[key]);
      if (bound !== undefined) {
        schema[key] = bound;
      }
    }

    const pattern = this.validPattern(name, info.pattern);
    if (pattern !== undefined) {
      schema.pattern = pattern;
    }

    if (Array.isArray(info.enum)) {
      schema.enum = [...info.enum];
    }

    if ('default' in info) {
      schema.default = info.default;
    }

    if (schema.type === 'array' && isRecord(info.items)) {
      schema.items = this.buildParameterSchema(`${name}[]`, info.items);
    }

    return schema;
  }

  /**
   * 200 schema from a `returns` descriptor: objects recurse into properties,
   * arrays into items
   */
  private convertReturns(info: Record<string, unknown>): SchemaOrRef {
    const typeName = typeof info.type === 'string' ? info.type : 'object';

    const standard = this.standardReference(typeName, info);
    if (standard) return standard;

    const schema = this.primitiveSchema(typeName, info.format);

    if (schema.type === 'array' && isRecord(info.items)) {
      schema.items = this.convertReturns(info.items);
    }

    if (schema.type === 'object' && isRecord(info.properties)) {
      const properties: Record<string, SchemaOrRef> = {};
      for (const [key, value] of Object.entries(info.properties)) {
        if (isRecord(value)) {
          properties[key] = this.convertReturns(value);
        }
      }
      if (Object.keys(properties).length > 0) {
        schema.properties = properties;
      }
    }

    if (typeof info.description === 'string') {
      schema.description = info.description;
    }

    return schema;
  }

  private buildResponses(returns: unknown): OpenAPIV3.ResponsesObject {
    const responses: OpenAPIV3.ResponsesObject = {};

    if (isRecord(returns) && Object.keys(returns).length > 0) {
      responses['200'] = {
        description: typeof returns.description === 'string' ? returns.description : 'Successful operation',
        content: { 'application/json': { schema: this.convertReturns(returns) } },
      };
    } else {
      responses['200'] = {
        description: 'Successful operation',
        content: { 'application/json': { schema: schemaRef('ProxmoxSuccess') } },
      };
    }

    for (const [status, description] of Object.entries(ERROR_RESPONSES)) {
      responses[status] = {
        description,
        content: { 'application/json': { schema: schemaRef('ProxmoxError') } },
      };
    }

    return responses;
  }

  private standardReference(typeName: string, info: Record<string, unknown>): OpenAPIV3.ReferenceObject | undefined {
    return matchStandardSchema(
      {
        type: typeName,
        pattern: unwrapPattern(info.pattern),
        description: typeof info.description === 'string' ? info.description.toLowerCase() : '',
        minimum: finiteNumber(info.minimum),
        maximum: finiteNumber(info.maximum),
      },
      this.profile.family
    );
  }

  private primitiveSchema(typeName: string, format: unknown): OpenAPIV3.SchemaObject {
    let schema: OpenAPIV3.SchemaObject;

    switch (typeName) {
      case 'string':
      case 'integer':
      case 'number':
      case 'boolean':
      case 'object':
        schema = { type: typeName };
        break;
      case 'array':
        schema = { type: 'array', items: {} };
        break;
      case 'null':
        // 3.0.3 has no null type
        schema = { nullable: true };
        break;
      default:
        return { type: 'string', description: `Type: ${typeName}` };
    }

    if (typeof format === 'string' && format.length > 0) {
      schema.format = format;
    }
    return schema;
  }

  private validPattern(name: string, raw: unknown): string | undefined {
    const pattern = unwrapPattern(raw);
    if (pattern === undefined) return undefined;

    try {
      new RegExp(pattern);
      return pattern;
    } catch (error) {
      this.logger.debug('Dropping invalid pattern', {
        parameter: name,
        pattern,
        error: toError(error).message,
      });
      return undefined;
    }
  }

  private buildInfo(): OpenAPIV3.InfoObject {
    const { profile } = this;
    const contact: OpenAPIV3.ContactObject = {};
    if (profile.contact_name) contact.name = profile.contact_name;
    if (profile.contact_url) contact.url = profile.contact_url;
    contact.email = profile.contact_email;

    const info: OpenAPIV3.InfoObject = {
      title: profile.title,
      description: profile.description,
      version: profile.version,
      contact,
    };

    if (profile.license) {
      info.license = { ...profile.license };
    }
    return info;
  }

  private buildServers(): OpenAPIV3.ServerObject[] {
    const { profile } = this;
    return [
      {
        url: `https://{host}:${profile.default_port}${profile.server_path}`,
        description: profile.server_description,
        variables: {
          host: {
            default: DEFAULTS.SERVER_HOST,
            description: profile.host_description,
          },
        },
      },
    ];
  }

  private collectTags(paths: OpenAPIV3.PathsObject): OpenAPIV3.TagObject[] {
    const names = new Set<string>();
    for (const pathItem of Object.values(paths)) {
      for (const key of Object.values(PATH_ITEM_KEYS)) {
        for (const tag of pathItem?.[key]?.tags ?? []) {
          names.add(tag);
        }
      }
    }

    return [...names].sort().map((name) => ({
      name,
      description: `${titleCase(name)} related operations`,
    }));
  }
}
