import type { JsonValue } from '~/types';
import cloneDeep from 'clone-deep';
import { log } from '~/debug';
import { JsonValidatorError } from '~/errors';
import { detectDialect, queryJsonPathMatches } from '~/query';
import { isObject } from '~/utils';

const toIndex = (index: number | string): number => {
  const n = typeof index === 'number' ? index : Number(index.trim());

  if (!Number.isInteger(n) || (typeof index === 'string' && index.trim() === '')) {
    throw new JsonValidatorError(`Index must be an integer, got '${index}'`);
  }

  return n;
};

/**
 * Replace the value at the `index`-th match of a JSONPath expression.
 * Works on a copy; the document passed in is left untouched.
 */
export const updateJson = (
  document: JsonValue,
  expr: string,
  value: JsonValue,
  index: number | string = 0
): JsonValue => {
  if (detectDialect(expr) !== 'jsonpath') {
    throw new JsonValidatorError(`Update json requires a JSONPath expression, got '${expr}'`);
  }

  const position = toIndex(index);
  const copy = cloneDeep(document);
  const matches = queryJsonPathMatches(copy, expr);

  if (matches.length === 0) {
    throw new JsonValidatorError(`Nothing found in the document using the given path ${expr}`);
  }

  const target = matches.at(position);

  if (target === undefined) {
    throw new JsonValidatorError(`No match at index ${position} for path ${expr}`);
  }

  const { parent, parentProperty } = target;
  log('replacing %s (match %d of %d)', target.path, position, matches.length);

  if (parentProperty === null) {
    return value;
  }

  if (Array.isArray(parent)) {
    parent[Number(parentProperty)] = value;
  } else if (isObject(parent)) {
    parent[String(parentProperty)] = value;
  }

  return copy;
};
