import assert from 'node:assert/strict';
import { JsonValidatorError, SchemaError, SchemaValidationError } from '~/errors';
import { defaultOptions } from '~/library';
import type { ValidatorSelector } from '~/schema';
import { createValidatorSelector, parseSchema, readSchemaFile, schemaDraft, validateJsonSchema } from '~/schema';
import { fixturePath } from './support';

const schema = JSON.stringify({
  type: 'object',
  required: ['foo'],
  properties: {
    foo: { type: 'string' },
    count: { type: 'integer', minimum: 0 }
  }
});

describe('schema', () => {
  let select: ValidatorSelector;

  beforeEach(() => {
    select = createValidatorSelector(defaultOptions);
  });

  describe('validateJsonSchema', () => {
    it('should accept conforming documents', () => {
      assert.doesNotThrow(() => validateJsonSchema(select, { foo: 'bar' }, schema));
      assert.doesNotThrow(() => validateJsonSchema(select, { foo: 'bar', count: 3 }, schema));
    });

    it('should report the violated constraint', () => {
      assert.throws(() => validateJsonSchema(select, { foo: 1 }, schema), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.strictEqual(err.errors.length, 1);
        assert.deepStrictEqual(err.errors[0], {
          keyword: 'type',
          instancePath: '/foo',
          schemaPath: '#/properties/foo/type',
          message: 'must be string',
          instance: 1
        });
        assert.strictEqual(err.message, 'Failed validating json by schema\n/foo: must be string [type]');
        return true;
      });
    });

    it('should use "/" for violations at the root', () => {
      assert.throws(() => validateJsonSchema(select, {}, schema), {
        message: "Failed validating json by schema\n/: must have required property 'foo' [required]"
      });
    });

    it('should collect every violation by default', () => {
      assert.throws(() => validateJsonSchema(select, { foo: 1, count: -1 }, schema), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.deepStrictEqual(err.errors.map(e => e.keyword), ['type', 'minimum']);
        assert.deepStrictEqual(err.errors.map(e => e.instancePath), ['/foo', '/count']);
        return true;
      });
    });

    it('should stop at the first violation when allErrors is disabled', () => {
      const firstOnly = createValidatorSelector({ ...defaultOptions, allErrors: false });
      assert.throws(() => validateJsonSchema(firstOnly, { foo: 1, count: -1 }, schema), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.strictEqual(err.errors.length, 1);
        return true;
      });
    });

    it('should accept parsed schemas', () => {
      assert.doesNotThrow(() => validateJsonSchema(select, [1, 2], { type: 'array', items: { type: 'number' } }));
      assert.throws(() => validateJsonSchema(select, [1, 'two'], { type: 'array', items: { type: 'number' } }), SchemaValidationError);
    });

    it('should handle boolean schemas', () => {
      assert.doesNotThrow(() => validateJsonSchema(select, { any: 'thing' }, true));
      assert.throws(() => validateJsonSchema(select, { any: 'thing' }, 'false'), SchemaValidationError);
    });

    it('should validate formats', () => {
      const email = { type: 'string', format: 'email' };
      assert.doesNotThrow(() => validateJsonSchema(select, 'user@example.com', email));
      assert.throws(() => validateJsonSchema(select, 'not-an-email', email), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.strictEqual(err.errors[0].keyword, 'format');
        return true;
      });
    });

    it('should validate the same identified schema more than once', () => {
      const identified = JSON.stringify({ $id: 'https://example.com/item.json', type: 'string' });
      assert.doesNotThrow(() => validateJsonSchema(select, 'a', identified));
      assert.doesNotThrow(() => validateJsonSchema(select, 'b', identified));
    });

    it('should support draft 2020-12 keywords', () => {
      const tuples = createValidatorSelector({ ...defaultOptions, draft: '2020-12' });
      const tuple = { type: 'array', prefixItems: [{ type: 'string' }], items: false };
      assert.doesNotThrow(() => validateJsonSchema(tuples, ['a'], tuple));
      assert.throws(() => validateJsonSchema(tuples, ['a', 1], tuple), SchemaValidationError);
    });

    it('should validate draft-04 schemas', () => {
      const draft04 = {
        $schema: 'http://json-schema.org/draft-04/schema#',
        type: 'object',
        required: ['price'],
        properties: {
          price: { type: 'number', minimum: 0, exclusiveMinimum: true }
        }
      };
      assert.doesNotThrow(() => validateJsonSchema(select, { price: 1 }, draft04));
      assert.throws(() => validateJsonSchema(select, { price: 0 }, draft04), SchemaValidationError);
      assert.throws(() => validateJsonSchema(select, {}, draft04), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.strictEqual(err.errors[0].keyword, 'required');
        return true;
      });
    });

    it('should validate draft-06 schemas', () => {
      const draft06 = { $schema: 'http://json-schema.org/draft-06/schema#', const: 'fixed' };
      assert.doesNotThrow(() => validateJsonSchema(select, 'fixed', draft06));
      assert.throws(() => validateJsonSchema(select, 'other', draft06), (err: unknown) => {
        assert.ok(err instanceof SchemaValidationError);
        assert.strictEqual(err.errors[0].keyword, 'const');
        return true;
      });
    });

    it('should pick the validator from $schema over the configured draft', () => {
      const latest = createValidatorSelector({ ...defaultOptions, draft: '2020-12' });
      const draft07 = { $schema: 'http://json-schema.org/draft-07/schema#', type: 'string' };
      assert.doesNotThrow(() => validateJsonSchema(latest, 'a', draft07));
      assert.throws(() => validateJsonSchema(latest, 1, draft07), SchemaValidationError);
    });

    it('should throw a SchemaError for schemas the validator rejects', () => {
      assert.throws(() => validateJsonSchema(select, {}, { type: 12 }), (err: unknown) => {
        assert.ok(err instanceof SchemaError);
        assert.match(err.message, /^Json-schema error: schema is invalid/);
        return true;
      });
    });
  });

  describe('schemaDraft', () => {
    it('should read the draft from $schema', () => {
      assert.strictEqual(schemaDraft({ $schema: 'http://json-schema.org/draft-04/schema#' }, '07'), '04');
      assert.strictEqual(schemaDraft({ $schema: 'http://json-schema.org/draft-06/schema#' }, '07'), '06');
      assert.strictEqual(schemaDraft({ $schema: 'http://json-schema.org/draft-07/schema#' }, '2020-12'), '07');
      assert.strictEqual(schemaDraft({ $schema: 'https://json-schema.org/draft/2019-09/schema' }, '07'), '2019-09');
      assert.strictEqual(schemaDraft({ $schema: 'https://json-schema.org/draft/2020-12/schema' }, '07'), '2020-12');
    });

    it('should fall back to the configured draft', () => {
      assert.strictEqual(schemaDraft({ type: 'string' }, '2019-09'), '2019-09');
      assert.strictEqual(schemaDraft(true, '07'), '07');
    });
  });

  describe('parseSchema', () => {
    it('should parse schema text', () => {
      assert.deepStrictEqual(parseSchema('{"type":"string"}'), { type: 'string' });
    });

    it('should throw a SchemaError for malformed text', () => {
      assert.throws(() => parseSchema('{type:'), (err: unknown) => {
        assert.ok(err instanceof SchemaError);
        assert.match(err.message, /^Error in schema: /);
        return true;
      });
    });

    it('should reject values that are not schemas', () => {
      assert.throws(() => parseSchema('42'), {
        name: 'SchemaError',
        message: 'Json-schema error: schema must be an object or a boolean, got number'
      });
      assert.throws(() => parseSchema(['string']), {
        message: 'Json-schema error: schema must be an object or a boolean, got array'
      });
    });

    it('should reject asynchronous schemas', () => {
      assert.throws(() => parseSchema({ $async: true, type: 'object' }), {
        message: 'Json-schema error: asynchronous schemas are not supported'
      });
    });
  });

  describe('readSchemaFile', () => {
    it('should read schema files', () => {
      const text = readSchemaFile(fixturePath('store.schema.json'));
      assert.strictEqual(JSON.parse(text).type, 'object');
    });

    it('should wrap read failures', () => {
      const missing = fixturePath('missing.schema.json');
      assert.throws(() => readSchemaFile(missing), (err: unknown) => {
        assert.ok(err instanceof JsonValidatorError);
        assert.ok(err.message.startsWith(`Could not read schema file '${missing}': `));
        assert.ok(err.cause instanceof Error);
        return true;
      });
    });
  });
});
