export * from '~/errors';
export * from '~/types';
export { convertToJson, jsonToString, prettyPrintJson, stringToJson } from '~/convert';
export { detectDialect, findElements, queryJsonPath, selectElements } from '~/query';
export { createValidator, createValidatorSelector, parseSchema, schemaDraft, validateJsonSchema } from '~/schema';
export type { ValidatorOptions, ValidatorSelector } from '~/schema';
export { updateJson } from '~/update';
export { getKeywordArguments, getKeywordDocumentation, getKeywordNames, keywords, runKeyword } from '~/keywords';
export type { KeywordArgument, KeywordDefinition } from '~/keywords';
export { KeywordLibrary, defaultOptions } from '~/library';
export { KeywordLibrary as default } from '~/library';
