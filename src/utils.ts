import type { JsonDocument, JsonObject, JsonValue } from '~/types';
import util from 'node:util';

export const inspect = (v: unknown): string => {
  return util.inspect(v, { depth: null, colors: false, maxArrayLength: null, breakLength: Infinity });
};

export const isObject = (v: unknown): v is Record<string, unknown> => {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
};

export const isJsonValue = (v: unknown): v is JsonValue => {
  if (v === null) return true;

  switch (typeof v) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(v);
    case 'object':
      if (Array.isArray(v)) return v.every(isJsonValue);
      return isObject(v) && Object.values(v).every(isJsonValue);
    default:
      return false;
  }
};

export const isJsonObject = (v: unknown): v is JsonObject => {
  return isObject(v) && isJsonValue(v);
};

export const isJsonDocument = (v: unknown): v is JsonDocument => {
  return (Array.isArray(v) || isObject(v)) && isJsonValue(v);
};

export const typeOf = (v: unknown): string => {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  return typeof v;
};
