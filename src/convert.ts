import type { JsonSource, JsonValue } from '~/types';
import { JsonValidatorError, ParseError } from '~/errors';
import { inspect, isJsonDocument, typeOf } from '~/utils';

export const stringToJson = (source: string): JsonValue => {
  try {
    return JSON.parse(source);
  } catch (err) {
    throw new ParseError(source, err instanceof Error ? err.message : String(err));
  }
};

/**
 * Accept JSON text or an already parsed array/object. Anything else is
 * rejected, since keywords only ever receive one of the two.
 */
export const convertToJson = (source: unknown): JsonValue => {
  if (typeof source === 'string') {
    return stringToJson(source);
  }

  if (isJsonDocument(source)) {
    return source;
  }

  throw new JsonValidatorError(`Invalid type of json source: ${typeOf(source)}`);
};

export const jsonToString = (source: unknown, indent?: number): string => {
  let output: string | undefined;

  try {
    output = JSON.stringify(source, null, indent);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new JsonValidatorError(`Could not serialize '${inspect(source)}' to JSON: ${reason}`, { cause: err });
  }

  if (output === undefined) {
    throw new JsonValidatorError(`Could not serialize '${inspect(source)}' to JSON: ${typeOf(source)} is not serializable`);
  }

  return output;
};

export const prettyPrintJson = (source: JsonSource, indent = 2): string => {
  return jsonToString(convertToJson(source), indent);
};
