import type { JsonPathMatch, JsonValue, QueryDialect } from '~/types';
import { JSONPath } from 'jsonpath-plus';
import { match as selectMatch } from 'JSONSelect';
import { log } from '~/debug';
import { JsonValidatorError } from '~/errors';
import { isJsonValue } from '~/utils';

const JSONPATH_PREFIX = /^\s*[$@]/;
const JSONSELECT_PREFIX = /^\s*(?:[.:*]|(?:string|number|object|array|boolean|null)(?!\w))/;

const assertExpression = (expr: string): void => {
  if (expr.trim() === '') {
    throw new JsonValidatorError('Expression must be a non-empty string');
  }
};

/**
 * Decide which evaluator handles `expr`. `$`/`@` paths are JSONPath,
 * selectors starting with `.`, `:`, `*` or a type name are JSONSelect,
 * and bare member paths such as `store.book[0]` fall back to JSONPath.
 */
export const detectDialect = (expr: string): QueryDialect => {
  if (JSONPATH_PREFIX.test(expr)) return 'jsonpath';
  if (JSONSELECT_PREFIX.test(expr)) return 'jsonselect';
  return 'jsonpath';
};

const syntaxError = (expr: string, reason: string): SyntaxError => {
  return new SyntaxError(`Invalid JSONPath expression '${expr}': ${reason}`);
};

/**
 * jsonpath-plus evaluates whatever it can make of a malformed path, so
 * brackets, parentheses, quotes and dots are checked before evaluation.
 */
export const assertJsonPathSyntax = (expr: string): void => {
  const closers: string[] = [];
  let quote = '';
  let prev = '';

  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i];

    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = '';
        prev = ch;
      }
      continue;
    }

    if (/\s/.test(ch)) continue;

    switch (ch) {
      case "'":
      case '"':
        quote = ch;
        break;
      case '[':
        if (prev === '[') throw syntaxError(expr, `unexpected '[' at ${i}`);
        closers.push(']');
        break;
      case '(':
        closers.push(')');
        break;
      case ']':
      case ')':
        if (closers.pop() !== ch) throw syntaxError(expr, `unexpected '${ch}' at ${i}`);
        if (ch === ']' && prev === '[') throw syntaxError(expr, `empty brackets at ${i}`);
        break;
      case '.':
        if (closers.length === 0 && expr.startsWith('...', i)) throw syntaxError(expr, `unexpected '...' at ${i}`);
        break;
      default: {
        break;
      }
    }

    prev = ch;
  }

  if (quote) throw syntaxError(expr, `unclosed ${quote}`);
  if (closers.length > 0) throw syntaxError(expr, `missing '${closers[closers.length - 1]}'`);
  if (prev === '.') throw syntaxError(expr, "path ends with '.'");
};

const prepareJsonPath = (expr: string): string => {
  assertExpression(expr);
  assertJsonPathSyntax(expr);
  // a leading `@` addresses the document itself, which jsonpath-plus only knows as `$`
  return expr.replace(/^\s*@/, match => `${match.slice(0, -1)}$`);
};

export const queryJsonPathMatches = (document: JsonValue, expr: string): JsonPathMatch[] => {
  const path = prepareJsonPath(expr);

  // jsonpath-plus matches nothing against a falsy root, not even `$`
  if (!document) {
    const matches = path.trim() === '$' ? [{ path: '$', value: document, parent: null, parentProperty: null, pointer: '' }] : [];
    log.query('jsonpath %s matched %d element(s) of a scalar root', expr, matches.length);
    return matches;
  }

  const matches: JsonPathMatch[] = JSONPath({ path, json: document, wrap: true, resultType: 'all' });
  log.query('jsonpath %s matched %d element(s)', expr, matches.length);
  return matches;
};

export const queryJsonPath = (document: JsonValue, expr: string): JsonValue[] => {
  return queryJsonPathMatches(document, expr).map(match => match.value);
};

export const selectElements = (document: JsonValue, expr: string): JsonValue[] => {
  assertExpression(expr);
  const values = selectMatch(expr, document).filter(isJsonValue);
  log.query('jsonselect %s matched %d element(s)', expr, values.length);
  return values;
};

export const findElements = (document: JsonValue, expr: string, dialect: QueryDialect | 'auto' = 'auto'): JsonValue[] => {
  assertExpression(expr);
  const resolved = dialect === 'auto' ? detectDialect(expr) : dialect;
  log.query('evaluating %s as %s', expr, resolved);
  return resolved === 'jsonselect' ? selectElements(document, expr) : queryJsonPath(document, expr);
};
