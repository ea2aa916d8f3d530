import { bindParameters, toParametersSchema } from './parameter_binder';
import { SkillParameterError } from './errors';
import type { SkillDefinition } from './skill_registry.types';

const shellLike: SkillDefinition = {
  name: 'demo',
  description: 'Demo skill',
  parameters: {
    action: { type: 'string', enum: ['run', 'check'], default: 'run' },
    command: { type: 'string' },
    timeout: { type: 'number', default: 30 },
    env: { type: 'object', required: false },
    payload: { type: 'any', required: false },
  },
  create: () => ({ execute: async () => null }),
};

describe('bindParameters', () => {
  it('should fill defaults for omitted parameters', () => {
    expect(bindParameters(shellLike, { command: 'ls' })).toEqual({ action: 'run', command: 'ls', timeout: 30 });
  });

  it('should pass undeclared parameters through', () => {
    expect(bindParameters(shellLike, { command: 'ls', extra: [1, 2] })).toEqual({
      action: 'run',
      command: 'ls',
      timeout: 30,
      extra: [1, 2],
    });
  });

  it('should not mutate the caller parameters', () => {
    const params = { command: 'ls' };

    bindParameters(shellLike, params);

    expect(params).toEqual({ command: 'ls' });
  });

  it('should accept any JSON value for an any-typed parameter', () => {
    expect(bindParameters(shellLike, { command: 'ls', payload: null }).payload).toBeNull();
  });

  it('should reject a missing required parameter', () => {
    expect(() => bindParameters(shellLike, {})).toThrow(
      "Invalid parameters for skill 'demo': must have required property 'command'"
    );
  });

  it('should reject a mistyped parameter', () => {
    expect(() => bindParameters(shellLike, { command: 'ls', timeout: 'soon' })).toThrow(SkillParameterError);
    expect(() => bindParameters(shellLike, { command: 'ls', timeout: 'soon' })).toThrow('timeout must be number');
  });

  it('should reject values outside an enum', () => {
    expect(() => bindParameters(shellLike, { command: 'ls', action: 'delete' })).toThrow(
      'action must be equal to one of the allowed values'
    );
  });
});

describe('toParametersSchema', () => {
  it('should mark parameters without defaults as required', () => {
    expect(toParametersSchema(shellLike.parameters)).toEqual({
      type: 'object',
      properties: {
        action: { type: 'string', enum: ['run', 'check'], default: 'run' },
        command: { type: 'string' },
        timeout: { type: 'number', default: 30 },
        env: { type: 'object' },
        payload: {},
      },
      required: ['command'],
      additionalProperties: true,
    });
  });
});
