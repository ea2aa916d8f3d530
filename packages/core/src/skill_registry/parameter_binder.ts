import Ajv from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { cloneJson } from '../types';
import { SkillParameterError } from './errors';
import type { ParameterSpec, SkillDefinition, SkillParams } from './skill_registry.types';

const ajv = new Ajv({ allErrors: true, useDefaults: true });

const validators = new WeakMap<SkillDefinition['parameters'], ValidateFunction<SkillParams>>();

export function isRequired(spec: ParameterSpec): boolean {
  return spec.required ?? spec.default === undefined;
}

function toPropertySchema(spec: ParameterSpec): SchemaObject {
  const schema: SchemaObject = spec.type === 'any' ? {} : { type: spec.type };
  if (spec.enum) schema['enum'] = spec.enum;
  if (spec.default !== undefined) schema['default'] = spec.default;
  return schema;
}

/**
 * JSON schema for a declared parameter map. Undeclared parameters are
 * allowed so skills can take open-ended extras.
 */
export function toParametersSchema(parameters: SkillDefinition['parameters']): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(parameters)) {
    properties[name] = toPropertySchema(spec);
    if (isRequired(spec)) required.push(name);
  }
  return { type: 'object', properties, required, additionalProperties: true };
}

function getValidator(definition: SkillDefinition): ValidateFunction<SkillParams> {
  let validate = validators.get(definition.parameters);
  if (!validate) {
    validate = ajv.compile<SkillParams>(toParametersSchema(definition.parameters));
    validators.set(definition.parameters, validate);
  }
  return validate;
}

/**
 * Checks `params` against the skill's declared parameters and returns a copy
 * with defaults filled in.
 *
 * @throws SkillParameterError when a required parameter is missing or a value has the wrong type
 */
export function bindParameters(definition: SkillDefinition, params: SkillParams): SkillParams {
  const bound = cloneJson(params);
  const validate = getValidator(definition);
  if (validate(bound)) {
    return bound;
  }
  const details = (validate.errors ?? []).map((error) =>
    error.instancePath ? `${error.instancePath.slice(1)} ${error.message ?? 'is invalid'}` : error.message ?? 'is invalid'
  );
  throw new SkillParameterError(definition.name, details);
}
