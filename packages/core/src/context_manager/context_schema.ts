import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { JsonObject } from '../types';
import type { Session } from './context_manager.types';

const MESSAGE_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['role', 'content', 'timestamp'],
  properties: {
    role: { type: 'string', enum: ['system', 'user', 'assistant'] },
    content: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
    metadata: { type: 'object', default: {} },
  },
};

const SESSION_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['id', 'startedAt', 'messages'],
  properties: {
    id: { type: 'string', minLength: 1 },
    startedAt: { type: 'string', format: 'date-time' },
    messages: { type: 'array', items: MESSAGE_SCHEMA },
    context: { type: 'object', default: {} },
    active: { type: 'boolean', default: true },
  },
};

const SESSIONS_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: SESSION_SCHEMA,
};

const GLOBAL_CONTEXT_SCHEMA: SchemaObject = {
  type: 'object',
};

// useDefaults fills metadata/context/active for blobs written without them
const ajv = new Ajv({ allErrors: true, useDefaults: true });
addFormats(ajv);

export const validateSessionsBlob = ajv.compile<Record<string, Session>>(SESSIONS_SCHEMA);
export const validateGlobalContextBlob = ajv.compile<JsonObject>(GLOBAL_CONTEXT_SCHEMA);

export function formatSchemaErrors(errors: typeof validateSessionsBlob.errors): string {
  if (!errors || errors.length === 0) return 'unknown schema error';
  return errors
    .map((error) => `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}
