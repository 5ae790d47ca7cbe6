/**
 * Test documents for the import/export tests
 */

import { ConsoleLogger, LogLevel } from '../logger.js';

export const silentLogger = new ConsoleLogger(LogLevel.SILENT);

/**
 * Small user directory API: one HEAD operation, one inline response body,
 * an array-of-refs response and a bare enum schema
 */
export const usersDocument = {
  openapi: '3.0.3',
  info: {
    title: 'Users',
    version: '1.0.0',
    description: 'User directory',
    contact: { name: 'Team Directory', email: 'directory@example.test' },
  },
  servers: [
    { url: 'https://users.example.test/v1', description: 'Production' },
    { url: 'https://users.stage.example.test/v1', description: 'Staging' },
  ],
  paths: {
    '/users/{id}': {
      get: {
        operationId: 'get_user',
        summary: 'Fetch a user',
        tags: ['users'],
        parameters: [
          { name: 'id', in: 'path', required: true, schema: { type: 'string' } },
          { name: 'expand', in: 'query', schema: { type: 'boolean' }, example: true },
          { name: 'X-Trace', in: 'header', schema: { type: 'string' } },
        ],
        responses: {
          '200': {
            description: 'The user',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/User' } } },
          },
          '404': { description: 'Not found' },
        },
      },
      head: {
        responses: { '200': { description: 'Exists' } },
      },
    },
    '/users': {
      get: {
        operationId: 'list_users',
        responses: {
          '200': {
            description: 'All users',
            content: {
              'application/json': { schema: { type: 'array', items: { $ref: '#/components/schemas/User' } } },
            },
          },
        },
      },
      post: {
        operationId: 'create_user',
        requestBody: {
          content: { 'application/json': { schema: { $ref: '#/components/schemas/NewUser' } } },
        },
        responses: {
          '201': {
            description: 'Created',
            content: {
              'application/json': { schema: { type: 'object', properties: { id: { type: 'string' } } } },
            },
          },
        },
      },
    },
  },
  components: {
    schemas: {
      User: {
        type: 'object',
        required: ['id', 'name'],
        properties: {
          id: { type: 'string', format: 'uuid' },
          name: { type: 'string' },
          role: { $ref: '#/components/schemas/Role' },
          tags: { type: 'array', items: { type: 'string' } },
        },
      },
      NewUser: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string' },
          role: { $ref: '#/components/schemas/Role' },
        },
      },
      Role: { type: 'string', title: 'Role', enum: ['admin', 'member'] },
    },
  },
};

export const usersDocumentJson = JSON.stringify(usersDocument, null, 2);

/**
 * Same service as YAML, with a different version and one operation only
 */
export const usersDocumentYaml = `openapi: 3.0.3
info:
  title: Users
  version: 1.1.0
paths:
  /users:
    get:
      operationId: list_users
      responses:
        "200":
          description: All users
          content:
            application/json:
              schema:
                type: array
                items:
                  $ref: "#/components/schemas/User"
components:
  schemas:
    User:
      type: object
      properties:
        id:
          type: string
`;
