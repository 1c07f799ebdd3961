import type { KeywordLibrary } from '~/library';
import type { JsonSource, JsonValue } from '~/types';
import { log } from '~/debug';
import { JsonValidatorError } from '~/errors';
import { isJsonDocument, isJsonValue, typeOf } from '~/utils';

export interface KeywordArgument {
  name: string;
  default?: string;
}

export interface KeywordDefinition {
  name: string;
  args: KeywordArgument[];
  doc: string;
  run: (library: KeywordLibrary, args: unknown[]) => unknown;
}

export const INTRO = [
  'Library for JSON validation, based on JSON Schema, JSONPath and JSONSelect.',
  'Documents are accepted as JSON text or as parsed arrays/objects.',
  'Expressions starting with `$` or `@` are evaluated as JSONPath, selectors starting with',
  '`.`, `:`, `*` or a type name as JSONSelect; any other expression is treated as JSONPath.'
].join(' ');

export const normalizeKeywordName = (name: string): string => {
  return name.toLowerCase().replace(/[\s_]/g, '');
};

const argumentError = (keyword: string, name: string, expected: string, value: unknown) => {
  return new JsonValidatorError(`Keyword '${keyword}' expects argument '${name}' to be ${expected}, got ${typeOf(value)}`);
};

const stringArg = (keyword: string, name: string, value: unknown): string => {
  if (typeof value !== 'string') throw argumentError(keyword, name, 'a string', value);
  return value;
};

const sourceArg = (keyword: string, name: string, value: unknown): JsonSource => {
  if (typeof value === 'string' || isJsonDocument(value)) return value;
  throw argumentError(keyword, name, 'JSON text, an array or an object', value);
};

const valueArg = (keyword: string, name: string, value: unknown): JsonValue => {
  if (isJsonValue(value)) return value;
  throw argumentError(keyword, name, 'a JSON value', value);
};

const indexArg = (keyword: string, name: string, value: unknown): number | string => {
  if (value === undefined) return 0;
  if (typeof value === 'number' || typeof value === 'string') return value;
  throw argumentError(keyword, name, 'a number', value);
};

export const keywords: KeywordDefinition[] = [
  {
    name: 'Validate Jsonschema',
    args: [{ name: 'json_source' }, { name: 'input_schema' }],
    doc: 'Validate JSON according to a schema given as text or as a parsed object.',
    run: (lib, [source, schema]) => {
      const name = 'Validate Jsonschema';
      return lib.validateJsonschema(sourceArg(name, 'json_source', source), schema);
    }
  },
  {
    name: 'Validate Jsonschema From File',
    args: [{ name: 'json_source' }, { name: 'path_to_schema' }],
    doc: 'Validate JSON according to a schema loaded from a UTF-8 file.',
    run: (lib, [source, filepath]) => {
      const name = 'Validate Jsonschema From File';
      return lib.validateJsonschemaFromFile(sourceArg(name, 'json_source', source), stringArg(name, 'path_to_schema', filepath));
    }
  },
  {
    name: 'Convert To Json',
    args: [{ name: 'json_source' }],
    doc: 'Return the JSON structure of JSON text; arrays and objects are returned as they are.',
    run: (lib, [source]) => lib.convertToJson(source)
  },
  {
    name: 'String To Json',
    args: [{ name: 'source' }],
    doc: 'Deserialize JSON text into a JSON structure.',
    run: (lib, [source]) => lib.stringToJson(stringArg('String To Json', 'source', source))
  },
  {
    name: 'Json To String',
    args: [{ name: 'source' }],
    doc: 'Serialize a JSON structure into JSON text.',
    run: (lib, [source]) => lib.jsonToString(source)
  },
  {
    name: 'Pretty Print Json',
    args: [{ name: 'json_string' }],
    doc: 'Return the document as indented JSON text.',
    run: (lib, [source]) => lib.prettyPrintJson(sourceArg('Pretty Print Json', 'json_string', source))
  },
  {
    name: 'Get Elements',
    args: [{ name: 'json_source' }, { name: 'expr' }],
    doc: 'Return the list of elements matching a JSONPath or JSONSelect expression. The list is empty when nothing matches.',
    run: (lib, [source, expr]) => {
      const name = 'Get Elements';
      return lib.getElements(sourceArg(name, 'json_source', source), stringArg(name, 'expr', expr));
    }
  },
  {
    name: 'Select Elements',
    args: [{ name: 'json_source' }, { name: 'expr' }],
    doc: 'Return the list of elements matching a JSONSelect expression.',
    run: (lib, [source, expr]) => {
      const name = 'Select Elements';
      return lib.selectElements(sourceArg(name, 'json_source', source), stringArg(name, 'expr', expr));
    }
  },
  {
    name: 'Element Should Exist',
    args: [{ name: 'json_source' }, { name: 'expr' }],
    doc: 'Fail unless one or more elements match the expression.',
    run: (lib, [source, expr]) => {
      const name = 'Element Should Exist';
      return lib.elementShouldExist(sourceArg(name, 'json_source', source), stringArg(name, 'expr', expr));
    }
  },
  {
    name: 'Element Should Not Exist',
    args: [{ name: 'json_source' }, { name: 'expr' }],
    doc: 'Fail if any element matches the expression.',
    run: (lib, [source, expr]) => {
      const name = 'Element Should Not Exist';
      return lib.elementShouldNotExist(sourceArg(name, 'json_source', source), stringArg(name, 'expr', expr));
    }
  },
  {
    name: 'Update Json',
    args: [{ name: 'json_source' }, { name: 'expr' }, { name: 'value' }, { name: 'index', default: '0' }],
    doc: 'Replace the value at the given match of a JSONPath expression and return the changed copy of the document.',
    run: (lib, [source, expr, value, index]) => {
      const name = 'Update Json';
      return lib.updateJson(
        sourceArg(name, 'json_source', source),
        stringArg(name, 'expr', expr),
        valueArg(name, 'value', value),
        indexArg(name, 'index', index)
      );
    }
  }
];

const byName = new Map(keywords.map(k => [normalizeKeywordName(k.name), k]));

export const findKeyword = (name: string): KeywordDefinition => {
  const keyword = byName.get(normalizeKeywordName(name));

  if (!keyword) {
    throw new JsonValidatorError(`No keyword with name '${name}' found`);
  }

  return keyword;
};

export const getKeywordNames = (): string[] => keywords.map(k => k.name);

export const getKeywordArguments = (name: string): string[] => {
  return findKeyword(name).args.map(arg => (arg.default === undefined ? arg.name : `${arg.name}=${arg.default}`));
};

export const getKeywordDocumentation = (name: string): string => {
  if (name === '__intro__') return INTRO;
  return findKeyword(name).doc;
};

export const runKeyword = (library: KeywordLibrary, name: string, args: unknown[] = []): unknown => {
  const keyword = findKeyword(name);
  const max = keyword.args.length;
  const min = keyword.args.filter(arg => arg.default === undefined).length;

  if (args.length < min || args.length > max) {
    const expected = min === max ? `${max}` : `${min} to ${max}`;
    throw new JsonValidatorError(`Keyword '${keyword.name}' expected ${expected} arguments, got ${args.length}`);
  }

  log.keyword('running %s with %d argument(s)', keyword.name, args.length);
  return keyword.run(library, args);
};
