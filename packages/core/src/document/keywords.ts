/**
 * Keyword tables used by the parser to find subschema positions and to
 * classify nodes. Keywords missing here are preserved and ignored.
 */

/** Value is a single subschema. */
export const SUBSCHEMA_KEYWORDS = new Set([
  'not',
  'if',
  'then',
  'else',
  'additionalProperties',
  'additionalItems',
  'propertyNames',
  'contains',
  'unevaluatedItems',
  'unevaluatedProperties',
]);

/** Value is a map of name → subschema. */
export const SUBSCHEMA_MAP_KEYWORDS = new Set([
  'properties',
  'patternProperties',
  'dependentSchemas',
  'definitions',
  '$defs',
]);

/** Value is a non-empty list of subschemas. */
export const SUBSCHEMA_LIST_KEYWORDS = new Set([
  'allOf',
  'anyOf',
  'oneOf',
  'prefixItems',
]);

/** Value is instance data and must never be read as a schema. */
export const DATA_KEYWORDS = new Set([
  'enum',
  'const',
  'default',
  'examples',
  'example',
]);

export const COMPOSITE_KEYWORDS = ['allOf', 'anyOf', 'oneOf', 'not', 'if'];
export const ENUM_KEYWORDS = ['enum', 'const'];
export const OBJECT_KEYWORDS = [
  'properties',
  'required',
  'additionalProperties',
  'patternProperties',
  'minProperties',
  'maxProperties',
  'propertyNames',
  'dependentRequired',
  'dependentSchemas',
  'dependencies',
];
export const ARRAY_KEYWORDS = [
  'items',
  'prefixItems',
  'additionalItems',
  'minItems',
  'maxItems',
  'uniqueItems',
  'contains',
];
