import type { ValidatorSelector } from '~/schema';
import type { JsonSource, JsonValue, KeywordLibraryOptions, ResolvedOptions } from '~/types';
import { convertToJson, jsonToString, prettyPrintJson, stringToJson } from '~/convert';
import { log } from '~/debug';
import { AssertionError } from '~/errors';
import * as keywords from '~/keywords';
import { findElements, selectElements } from '~/query';
import { createValidatorSelector, readSchemaFile, validateJsonSchema } from '~/schema';
import { updateJson } from '~/update';

export const defaultOptions: ResolvedOptions = {
  draft: '07',
  allErrors: true,
  strict: false,
  formats: true,
  dialect: 'auto',
  indent: 2
};

/**
 * JSON validation keywords backed by JSON Schema, JSONPath and JSONSelect.
 *
 * Every method takes the document as JSON text or as a parsed array/object
 * and parses text once per call. Failures are thrown as subclasses of
 * `JsonValidatorError`.
 */
export class KeywordLibrary {
  readonly options: ResolvedOptions;
  private readonly validators: ValidatorSelector;

  constructor(options: KeywordLibraryOptions = {}) {
    this.options = { ...defaultOptions, ...options };
    this.validators = createValidatorSelector(this.options);
    log('created keyword library %o', this.options);
  }

  validateJsonschema(source: JsonSource, schema: unknown): void {
    validateJsonSchema(this.validators, convertToJson(source), schema);
  }

  validateJsonschemaFromFile(source: JsonSource, pathToSchema: string): void {
    const document = convertToJson(source);
    validateJsonSchema(this.validators, document, readSchemaFile(pathToSchema));
  }

  convertToJson(source: unknown): JsonValue {
    return convertToJson(source);
  }

  stringToJson(source: string): JsonValue {
    return stringToJson(source);
  }

  jsonToString(source: unknown): string {
    return jsonToString(source);
  }

  prettyPrintJson(source: JsonSource): string {
    return prettyPrintJson(source, this.options.indent);
  }

  getElements(source: JsonSource, expr: string): JsonValue[] {
    return findElements(convertToJson(source), expr, this.options.dialect);
  }

  selectElements(source: JsonSource, expr: string): JsonValue[] {
    return selectElements(convertToJson(source), expr);
  }

  elementShouldExist(source: JsonSource, expr: string): void {
    if (this.getElements(source, expr).length === 0) {
      throw new AssertionError(`Elements ${expr} does not exist`, expr);
    }
  }

  elementShouldNotExist(source: JsonSource, expr: string): void {
    if (this.getElements(source, expr).length > 0) {
      throw new AssertionError(`Elements ${expr} exist but should not`, expr);
    }
  }

  updateJson(source: JsonSource, expr: string, value: JsonValue, index: number | string = 0): JsonValue {
    return updateJson(convertToJson(source), expr, value, index);
  }

  // Keyword-runner interface

  getKeywordNames(): string[] {
    return keywords.getKeywordNames();
  }

  getKeywordArguments(name: string): string[] {
    return keywords.getKeywordArguments(name);
  }

  getKeywordDocumentation(name: string): string {
    return keywords.getKeywordDocumentation(name);
  }

  runKeyword(name: string, args: unknown[] = []): unknown {
    return keywords.runKeyword(this, name, args);
  }
}
