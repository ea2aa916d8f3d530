import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import type { ValidatedConfig } from './config_manager.types';

export const CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    memory: {
      type: 'object',
      default: {},
      additionalProperties: false,
      properties: {
        backend: { type: 'string', enum: ['yaml', 'json', 'memory'], default: 'yaml' },
        path: { type: 'string', minLength: 1 },
      },
    },
    context: {
      type: 'object',
      default: {},
      additionalProperties: false,
      properties: {
        maxHistoryLength: { type: 'integer', minimum: 1, default: 100 },
        contextWindow: { type: 'integer', minimum: 1, default: 10 },
      },
    },
    engine: {
      type: 'object',
      default: {},
      additionalProperties: false,
      properties: {
        maxConcurrentTasks: { type: 'integer', minimum: 1, default: 5 },
      },
    },
    skills: {
      type: 'object',
      default: {},
      additionalProperties: false,
      properties: {
        hotReload: { type: 'boolean', default: false },
        modules: { type: 'array', items: { type: 'string' }, default: [] },
      },
    },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
};

const ajv = new Ajv({ allErrors: true, useDefaults: true });

export const validateConfig = ajv.compile<ValidatedConfig>(CONFIG_SCHEMA);
