import { DEFAULT_DIALECT, type Dialect } from './detectDialect.js';

/**
 * Keyword-interpretation rules for one dialect. The evaluators consult the
 * profile wherever two dialects read the same keyword differently.
 */
export interface KeywordProfile {
  readonly dialect: Dialect;
  /** draft-04 / OpenAPI 3.0: `exclusiveMinimum: true` modifies `minimum`. */
  readonly exclusiveBounds: 'numeric' | 'boolean';
  /** Up to draft-07 (and OpenAPI 3.0) keywords beside `$ref` are ignored. */
  readonly refSiblings: 'ignore' | 'evaluate';
  /** Keyword that holds positional item schemas. */
  readonly tupleKeyword: 'items' | 'prefixItems';
  /** OpenAPI 3.0 `nullable: true` admits null whatever `type` says. */
  readonly nullable: boolean;
  /** Keywords this dialect does not define; the engine skips them. */
  readonly ignoredKeywords: ReadonlySet<string>;
}

const SPLIT_DEPENDENCIES = ['dependentRequired', 'dependentSchemas'];
const LEGACY_DEPENDENCIES = ['dependencies'];
const CONDITIONALS = ['if', 'then', 'else'];

const PROFILES: Record<Dialect, KeywordProfile> = {
  'draft-04': {
    dialect: 'draft-04',
    exclusiveBounds: 'boolean',
    refSiblings: 'ignore',
    tupleKeyword: 'items',
    nullable: false,
    ignoredKeywords: new Set([
      ...SPLIT_DEPENDENCIES,
      ...CONDITIONALS,
      'const',
      'contains',
      'propertyNames',
      'prefixItems',
      'nullable',
    ]),
  },
  'draft-06': {
    dialect: 'draft-06',
    exclusiveBounds: 'numeric',
    refSiblings: 'ignore',
    tupleKeyword: 'items',
    nullable: false,
    ignoredKeywords: new Set([
      ...SPLIT_DEPENDENCIES,
      ...CONDITIONALS,
      'prefixItems',
      'nullable',
    ]),
  },
  'draft-07': {
    dialect: 'draft-07',
    exclusiveBounds: 'numeric',
    refSiblings: 'ignore',
    tupleKeyword: 'items',
    nullable: false,
    ignoredKeywords: new Set([...SPLIT_DEPENDENCIES, 'prefixItems', 'nullable']),
  },
  '2019-09': {
    dialect: '2019-09',
    exclusiveBounds: 'numeric',
    refSiblings: 'evaluate',
    tupleKeyword: 'items',
    nullable: false,
    ignoredKeywords: new Set([...LEGACY_DEPENDENCIES, 'prefixItems', 'nullable']),
  },
  '2020-12': {
    dialect: '2020-12',
    exclusiveBounds: 'numeric',
    refSiblings: 'evaluate',
    tupleKeyword: 'prefixItems',
    nullable: false,
    ignoredKeywords: new Set([
      ...LEGACY_DEPENDENCIES,
      'additionalItems',
      'nullable',
    ]),
  },
  'openapi-3.0': {
    dialect: 'openapi-3.0',
    exclusiveBounds: 'boolean',
    refSiblings: 'ignore',
    tupleKeyword: 'items',
    nullable: true,
    ignoredKeywords: new Set([
      ...SPLIT_DEPENDENCIES,
      ...LEGACY_DEPENDENCIES,
      ...CONDITIONALS,
      'const',
      'contains',
      'propertyNames',
      'prefixItems',
    ]),
  },
  'openapi-3.1': {
    dialect: 'openapi-3.1',
    exclusiveBounds: 'numeric',
    refSiblings: 'evaluate',
    tupleKeyword: 'prefixItems',
    nullable: false,
    ignoredKeywords: new Set([
      ...LEGACY_DEPENDENCIES,
      'additionalItems',
      'nullable',
    ]),
  },
};

export function getProfile(dialect: Dialect = DEFAULT_DIALECT): KeywordProfile {
  return PROFILES[dialect];
}
