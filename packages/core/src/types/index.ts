export type { IsoTimestamp, JsonObject, JsonValue } from './common.types';
export { cloneJson, isJsonObject, isJsonValue } from './type_guards';
