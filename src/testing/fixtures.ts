/**
 * Sample apidoc.js sources and profiles shared by the tests
 */

import type { ApiProfile } from '../types/profile.js';

/**
 * Loosely-formed source: trailing commas, single-quoted keys and values, and a
 * regex literal. Strict JSON rejects it; the normalizer recovers it.
 */
export const SAMPLE_APIDOC_SOURCE = `// API viewer data
const apiSchema = [
  {
    "path": "/nodes",
    "text": "nodes",
    "leaf": 0,
    "info": {
      "GET": {
        "description": "Cluster node index.",
        "returns": { "type": "array", "items": { "type": "object" } },
      },
    },
    "children": [
      {
        "path": "/{node}/status",
        "text": "status",
        "leaf": 1,
        "info": {
          "GET": {
            "description": "Read node status.",
            "parameters": {
              "properties": {
                "node": { "type": "string", "description": "The cluster node name." },
                "verbose": { "type": "boolean", "optional": 1 },
              },
            },
            "returns": { "type": "object" },
          },
          "POST": {
            "description": "Reboot or shutdown a node.",
            "parameters": {
              "properties": {
                "node": { "type": "string" },
                "command": { "type": "string", "enum": ["reboot", "shutdown"] },
              },
            },
          },
        },
      },
    ],
  },
  {
    'path': '/access',
    'text': 'access',
    "leaf": 0,
    "info": {
      "GET": { "description": "Directory index.", "permissions": { "user": "all" } },
    },
    "children": [
      {
        "path": "/users",
        "text": "users",
        "leaf": 1,
        "info": {
          "POST": {
            "description": "Create new user.",
            "parameters": {
              "properties": {
                "userid": { "type": "string", "pattern": "/^[^@]+@[^@]+$/", "description": "Full User ID, in the name@realm format." },
                "comment": { "type": "string", "optional": 1 },
              },
            },
            "returns": { "type": "null" },
          },
        },
      },
    ],
  },
];

Ext.onReady(function () { renderApiViewer(apiSchema); });
`;

/**
 * Source no textual rewrite can decode (string concatenation, a call), but
 * whose path entries and verbs are still visible
 */
export const UNDECODABLE_APIDOC_SOURCE = `var apiSchema = [
  {
    "path": "/version",
    "text": "version",
    "info": {
      "GET": { "description": "API version details." + " Deprecated fields omitted." },
    },
  },
  {
    "path": "/cluster",
    "text": "cluster",
    "info": {},
    "children": [
      {
        "path": "/cluster/status",
        "info": {
          "GET": { "description": "Cluster status." },
          "POST": { "description": getDescription() },
        },
      },
    ],
  },
];
`;

/**
 * The tree from the status endpoint walkthrough: one descriptor at /nodes/{node}/status
 */
export const NODE_STATUS_TREE = [
  {
    path: '/nodes',
    children: [
      {
        path: '/{node}/status',
        info: {
          GET: {
            description: 'Read status',
            parameters: { properties: { verbose: { type: 'boolean', optional: true } } },
            returns: { type: 'object' },
          },
        },
      },
    ],
  },
];

export function createTestProfile(overrides: Partial<ApiProfile> = {}): ApiProfile {
  return {
    name: 'test',
    family: 'virtual-environment',
    title: 'Test API',
    description: 'Profile used by the test suite',
    version: '1.0.0',
    default_port: 8006,
    server_path: '/api2/json',
    server_description: 'Test server',
    host_description: 'Test server hostname',
    auth_schemes: {
      ApiToken: { type: 'apiKey', in: 'header', name: 'Authorization' },
    },
    tag_mapping: {
      nodes: 'Nodes',
      access: 'Access Control',
    },
    contact_email: 'api@example.com',
    security_patterns: [{ ApiToken: [] }],
    ...overrides,
  };
}
