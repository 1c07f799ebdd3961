import type { ErrorObject, Schema, ValidateFunction } from 'ajv';
import type { JsonValue, ResolvedOptions, SchemaDraft, SchemaViolation } from '~/types';
import fs from 'node:fs';
import Ajv from 'ajv';
import Ajv2019 from 'ajv/dist/2019';
import Ajv2020 from 'ajv/dist/2020';
import draft06MetaSchema from 'ajv/dist/refs/json-schema-draft-06.json';
import AjvDraft04 from 'ajv-draft-04';
import addFormats from 'ajv-formats';
import { log } from '~/debug';
import { JsonValidatorError, SchemaError, SchemaValidationError } from '~/errors';
import { isObject, typeOf } from '~/utils';

const isSchema = (value: unknown): value is Schema => {
  return typeof value === 'boolean' || isObject(value);
};

export type ValidatorOptions = Pick<ResolvedOptions, 'draft' | 'allErrors' | 'strict' | 'formats'>;

export type ValidatorSelector = (schema: Schema) => Ajv;

export const createValidator = (options: ValidatorOptions): Ajv => {
  const ajvOptions = {
    allErrors: options.allErrors,
    strict: options.strict,
    verbose: true,
    addUsedSchema: false
  };

  let ajv: Ajv;

  switch (options.draft) {
    case '04':
      ajv = new AjvDraft04(ajvOptions);
      break;
    case '06':
      ajv = new Ajv(ajvOptions);
      ajv.addMetaSchema(draft06MetaSchema);
      break;
    case '2019-09':
      ajv = new Ajv2019(ajvOptions);
      break;
    case '2020-12':
      ajv = new Ajv2020(ajvOptions);
      break;
    case '07':
    default: {
      ajv = new Ajv(ajvOptions);
      break;
    }
  }

  if (options.formats) {
    addFormats(ajv);
  }

  log.schema('created validator for draft %s', options.draft);
  return ajv;
};

/**
 * Read the draft a schema declares in `$schema`; schemas without one use
 * `fallback`.
 */
export const schemaDraft = (schema: Schema, fallback: SchemaDraft): SchemaDraft => {
  if (!isObject(schema) || typeof schema.$schema !== 'string') return fallback;

  const uri = schema.$schema;
  if (uri.includes('draft-04')) return '04';
  if (uri.includes('draft-06')) return '06';
  if (uri.includes('draft-07')) return '07';
  if (uri.includes('2019-09')) return '2019-09';
  if (uri.includes('2020-12')) return '2020-12';
  return fallback;
};

/**
 * One validator per draft, created the first time a schema of that
 * draft is validated. A single ajv instance cannot mix draft-04 with
 * later drafts.
 */
export const createValidatorSelector = (options: ValidatorOptions): ValidatorSelector => {
  const validators = new Map<SchemaDraft, Ajv>();

  return schema => {
    const draft = schemaDraft(schema, options.draft);
    let ajv = validators.get(draft);

    if (!ajv) {
      ajv = createValidator({ ...options, draft });
      validators.set(draft, ajv);
    }

    return ajv;
  };
};

export const parseSchema = (input: unknown): Schema => {
  let schema: unknown = input;

  if (typeof input === 'string') {
    try {
      schema = JSON.parse(input);
    } catch (err) {
      throw new SchemaError(`Error in schema: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (isObject(schema) && schema.$async === true) {
    throw new SchemaError('Json-schema error: asynchronous schemas are not supported');
  }

  if (!isSchema(schema)) {
    throw new SchemaError(`Json-schema error: schema must be an object or a boolean, got ${typeOf(schema)}`);
  }

  return schema;
};

export const readSchemaFile = (filepath: string): string => {
  try {
    return fs.readFileSync(filepath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new JsonValidatorError(`Could not read schema file '${filepath}': ${reason}`, { cause: err });
  }
};

export const toViolation = (error: ErrorObject): SchemaViolation => ({
  keyword: error.keyword,
  instancePath: error.instancePath,
  schemaPath: error.schemaPath,
  message: error.message ?? error.keyword,
  instance: error.data
});

const compileSchema = (ajv: Ajv, schema: Schema): ValidateFunction => {
  try {
    return ajv.compile(schema);
  } catch (err) {
    throw new SchemaError(`Json-schema error: ${err instanceof Error ? err.message : String(err)}`);
  }
};

export const validateJsonSchema = (select: ValidatorSelector, document: JsonValue, input: unknown): void => {
  const schema = parseSchema(input);
  const ajv = select(schema);

  try {
    const validate = compileSchema(ajv, schema);

    if (!validate(document)) {
      const violations = (validate.errors ?? []).map(toViolation);
      log.schema('document failed validation with %d error(s)', violations.length);
      throw new SchemaValidationError(violations);
    }

    log.schema('document is valid');
  } finally {
    if (isObject(schema)) {
      ajv.removeSchema(schema);
    }
  }
};
