import * as yaml from 'js-yaml';
import type { Serializer } from './store';

export const JSON_SERIALIZER: Serializer = {
  extension: '.json',
  stringify: (value) => JSON.stringify(value, null, 2),
  parse: (text) => JSON.parse(text),
};

export const YAML_SERIALIZER: Serializer = {
  extension: '.yaml',
  stringify: (value) => yaml.dump(value, { noRefs: true, sortKeys: false }),
  // JSON_SCHEMA keeps timestamps as strings instead of Date objects
  parse: (text) => yaml.load(text, { schema: yaml.JSON_SCHEMA }),
};
