export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonDocument = JsonValue[] | JsonObject;

export type JsonSource = string | JsonDocument;

export type QueryDialect = 'jsonpath' | 'jsonselect';

export type SchemaDraft = '04' | '06' | '07' | '2019-09' | '2020-12';

export interface KeywordLibraryOptions {
  // Schema
  draft?: SchemaDraft;
  allErrors?: boolean;
  strict?: boolean;
  formats?: boolean;

  // Queries
  dialect?: QueryDialect | 'auto';

  // Output
  indent?: number;
}

export type ResolvedOptions = Required<KeywordLibraryOptions>;

export interface SchemaViolation {
  keyword: string;
  instancePath: string;
  schemaPath: string;
  message: string;
  instance?: unknown;
}

export interface JsonPathMatch {
  path: string;
  value: JsonValue;
  parent: JsonValue;
  parentProperty: string | number | null;
  pointer: string;
}
