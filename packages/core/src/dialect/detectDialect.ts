/* eslint-disable complexity */
import type { Json } from '../document/json.js';
import { isJsonObject } from '../document/json.js';
import { parseSchema } from '../document/parse-schema.js';
import { SchemaDocument } from '../document/schema-node.js';

export type Dialect =
  | 'draft-04'
  | 'draft-06'
  | 'draft-07'
  | '2019-09'
  | '2020-12'
  | 'openapi-3.0'
  | 'openapi-3.1';

export const DIALECTS: readonly Dialect[] = [
  'draft-04',
  'draft-06',
  'draft-07',
  '2019-09',
  '2020-12',
  'openapi-3.0',
  'openapi-3.1',
];

export const DEFAULT_DIALECT: Dialect = '2020-12';

type JsonSchemaDialect = Exclude<Dialect, 'openapi-3.0' | 'openapi-3.1'>;

const DIALECT_CANONICAL_META: Record<JsonSchemaDialect, string> = {
  'draft-04': 'http://json-schema.org/draft-04/schema',
  'draft-06': 'http://json-schema.org/draft-06/schema',
  'draft-07': 'http://json-schema.org/draft-07/schema',
  '2019-09': 'https://json-schema.org/draft/2019-09/schema',
  '2020-12': 'https://json-schema.org/draft/2020-12/schema',
};

function normalizeForIndex(uri: string): string {
  const trimmed = uri.trim();
  if (!trimmed) return '';
  const withoutFragment = trimmed.split('#')[0] ?? trimmed;
  const lower = withoutFragment.toLowerCase();
  const normalizedScheme = lower.startsWith('https://')
    ? `http://${lower.slice('https://'.length)}`
    : lower;
  return normalizedScheme.endsWith('/')
    ? normalizedScheme.slice(0, -1)
    : normalizedScheme;
}

const JSON_SCHEMA_DIALECTS: readonly JsonSchemaDialect[] = [
  'draft-04',
  'draft-06',
  'draft-07',
  '2019-09',
  '2020-12',
];

const URI_DIALECT_BY_NORMALIZED = new Map<string, JsonSchemaDialect>();
for (const dialect of JSON_SCHEMA_DIALECTS) {
  URI_DIALECT_BY_NORMALIZED.set(
    normalizeForIndex(DIALECT_CANONICAL_META[dialect]),
    dialect
  );
}

export function isDialect(value: string): value is Dialect {
  return (DIALECTS as readonly string[]).includes(value);
}

/** Map a `$schema` URI onto a dialect, tolerating http/https and fragments. */
export function dialectFromMetaUri(uri: string): Dialect | undefined {
  const normalized = normalizeForIndex(uri);
  const exact = URI_DIALECT_BY_NORMALIZED.get(normalized);
  if (exact) return exact;
  for (const dialect of JSON_SCHEMA_DIALECTS) {
    if (normalized.includes(dialect)) return dialect;
  }
  return undefined;
}

/** Map an OpenAPI/Swagger version string onto a dialect. */
export function dialectFromOpenApiVersion(version: string): Dialect | undefined {
  const trimmed = version.trim();
  if (/^3\.1(\.|$)/.test(trimmed)) return 'openapi-3.1';
  if (/^3\.0(\.|$)/.test(trimmed)) return 'openapi-3.0';
  // Swagger 2.0 schema objects share the 3.0 keyword semantics we care about
  if (/^2\.0(\.|$)/.test(trimmed)) return 'openapi-3.0';
  return undefined;
}

/** Keywords OpenAPI 3.0 schema objects do not define. */
const BEYOND_OPENAPI_30 = [
  'const',
  'contains',
  'propertyNames',
  'if',
  'then',
  'else',
  'prefixItems',
  'dependentRequired',
  'dependentSchemas',
  'dependencies',
];

interface FeatureFlags {
  hasPrefixItems: boolean;
  hasTupleItems: boolean;
  hasDefs: boolean;
  hasIfThenElseOrConst: boolean;
  hasNullable: boolean;
  hasBeyondOpenApi30: boolean;
}

/** Keyword features of schema nodes only, never of data under `enum` or `examples`. */
function scanFeatureFlags(document: SchemaDocument): FeatureFlags {
  const flags: FeatureFlags = {
    hasPrefixItems: false,
    hasTupleItems: false,
    hasDefs: false,
    hasIfThenElseOrConst: false,
    hasNullable: false,
    hasBeyondOpenApi30: false,
  };

  for (const { keywords } of document.nodes()) {
    const has = (key: string): boolean => keywords.has(key);
    if (has('prefixItems')) flags.hasPrefixItems = true;
    if (Array.isArray(keywords.get('items'))) flags.hasTupleItems = true;
    if (has('$defs')) flags.hasDefs = true;
    if (has('if') || has('then') || has('else') || has('const')) {
      flags.hasIfThenElseOrConst = true;
    }
    if (keywords.get('nullable') === true) flags.hasNullable = true;
    if (BEYOND_OPENAPI_30.some(has)) flags.hasBeyondOpenApi30 = true;
  }
  return flags;
}

function dialectFromFeatures(flags: FeatureFlags): Dialect {
  if (flags.hasPrefixItems) return '2020-12';
  // only when every keyword in use exists in OpenAPI 3.0
  if (flags.hasNullable && !flags.hasBeyondOpenApi30) return 'openapi-3.0';
  if (flags.hasDefs) return flags.hasTupleItems ? '2019-09' : '2020-12';
  if (flags.hasTupleItems || flags.hasIfThenElseOrConst) return 'draft-07';
  return DEFAULT_DIALECT;
}

/**
 * Pick the dialect a document is written in: an explicit `$schema`, then an
 * `openapi`/`swagger` version, then keyword features of its schema nodes.
 * Falls back to DEFAULT_DIALECT.
 */
export function detectDialect(source: Json | SchemaDocument): Dialect {
  const schema = source instanceof SchemaDocument ? source.raw : source;
  if (!isJsonObject(schema)) return DEFAULT_DIALECT;

  const meta = schema.$schema;
  if (typeof meta === 'string') {
    const dialect = dialectFromMetaUri(meta);
    if (dialect) return dialect;
  }
  const openapi = schema.openapi ?? schema.swagger;
  if (typeof openapi === 'string') {
    const dialect = dialectFromOpenApiVersion(openapi);
    if (dialect) return dialect;
  }

  if (source instanceof SchemaDocument) {
    return dialectFromFeatures(scanFeatureFlags(source));
  }
  const parsed = parseSchema(schema);
  return parsed.isOk()
    ? dialectFromFeatures(scanFeatureFlags(parsed.value))
    : DEFAULT_DIALECT;
}
