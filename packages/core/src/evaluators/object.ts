import {
  hasOwn,
  isJsonObject,
  type Instance,
  type Json,
  type JsonObject,
} from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import {
  evaluateChild,
  failure,
  invalidKeyword,
  ownedKeywords,
  readKeyword,
} from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = [
  'required',
  'properties',
  'patternProperties',
  'additionalProperties',
  'propertyNames',
  'dependentRequired',
  'dependentSchemas',
  'dependencies',
];

function stringList(value: Json): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const list: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') return undefined;
    list.push(entry);
  }
  return list;
}

function required(
  value: Json,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  const names = stringList(value);
  if (!names) return [invalidKeyword(scope, 'required', 'must be an array of strings')];
  return names
    .filter((name) => !hasOwn(instance, name))
    .map((name) =>
      failure(scope, 'required', 'required', `Missing required property "${name}"`, {
        property: name,
      })
    );
}

function properties(
  node: SchemaNode,
  value: Json,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  if (!isJsonObject(value)) return [];
  const failures: FailureRecord[] = [];
  for (const name of Object.keys(value)) {
    if (!hasOwn(instance, name)) continue;
    failures.push(
      ...evaluateChild(node, ['properties', name], instance[name] ?? null, scope, name)
    );
  }
  return failures;
}

/** Compiled `patternProperties` entries; invalid sources are reported once. */
function compilePatterns(
  value: Json | undefined,
  scope: EvaluationScope
): { patterns: [string, RegExp][]; invalid: FailureRecord[] } {
  const patterns: [string, RegExp][] = [];
  const invalid: FailureRecord[] = [];
  if (!isJsonObject(value)) return { patterns, invalid };
  for (const source of Object.keys(value)) {
    const compiled = scope.ctx.pattern(source);
    if (compiled instanceof SyntaxError) {
      invalid.push(
        invalidKeyword(
          scope,
          'patternProperties',
          `has an invalid pattern ${source}: ${compiled.message}`
        )
      );
    } else {
      patterns.push([source, compiled]);
    }
  }
  return { patterns, invalid };
}

function patternProperties(
  node: SchemaNode,
  value: Json,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  const { patterns, invalid } = compilePatterns(value, scope);
  const failures = [...invalid];
  for (const [source, regex] of patterns) {
    for (const name of Object.keys(instance)) {
      if (!regex.test(name)) continue;
      failures.push(
        ...evaluateChild(
          node,
          ['patternProperties', source],
          instance[name] ?? null,
          scope,
          name
        )
      );
    }
  }
  return failures;
}

function additionalProperties(
  node: SchemaNode,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  const declared = readKeyword(node, 'properties', scope);
  const { patterns } = compilePatterns(
    readKeyword(node, 'patternProperties', scope),
    scope
  );
  const extra = Object.keys(instance).filter(
    (name) =>
      !(isJsonObject(declared) && hasOwn(declared, name)) &&
      !patterns.some(([, regex]) => regex.test(name))
  );

  const child = scope.document.child(node, 'additionalProperties');
  if (child?.kind === 'boolean-literal' && !child.value) {
    return extra.map((name) =>
      failure(
        scope,
        'additionalProperties',
        'additional-properties',
        `Property "${name}" is not allowed`,
        { property: name }
      )
    );
  }

  const failures: FailureRecord[] = [];
  for (const name of extra) {
    failures.push(
      ...evaluateChild(
        node,
        ['additionalProperties'],
        instance[name] ?? null,
        scope,
        name
      )
    );
  }
  return failures;
}

function propertyNames(
  node: SchemaNode,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  const failures: FailureRecord[] = [];
  for (const name of Object.keys(instance)) {
    const causes = evaluateChild(node, ['propertyNames'], name, scope);
    if (causes.length === 0) continue;
    failures.push(
      failure(
        scope,
        'propertyNames',
        'property-names',
        `Property name "${name}" is invalid`,
        { property: name },
        { causes }
      )
    );
  }
  return failures;
}

function missingDependencies(
  keyword: string,
  trigger: string,
  names: readonly string[],
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  return names
    .filter((name) => !hasOwn(instance, name))
    .map((name) =>
      failure(
        scope,
        [keyword, trigger],
        'dependent-required',
        `Property "${name}" is required when "${trigger}" is present`,
        { property: trigger, missing: name }
      )
    );
}

/**
 * `dependentRequired`, `dependentSchemas` and the older `dependencies`,
 * which mixes both forms under one keyword.
 */
function dependencies(
  node: SchemaNode,
  keyword: string,
  value: Json,
  instance: JsonObject,
  scope: EvaluationScope
): FailureRecord[] {
  if (!isJsonObject(value)) {
    return [invalidKeyword(scope, keyword, 'must be an object')];
  }
  const failures: FailureRecord[] = [];
  for (const [trigger, dependency] of Object.entries(value)) {
    if (!hasOwn(instance, trigger)) continue;
    const names = keyword === 'dependentSchemas' ? undefined : stringList(dependency);
    if (names) {
      failures.push(...missingDependencies(keyword, trigger, names, instance, scope));
    } else if (keyword !== 'dependentRequired') {
      failures.push(...evaluateChild(node, [keyword, trigger], instance, scope));
    } else {
      failures.push(
        invalidKeyword(scope, keyword, `entry "${trigger}" must be an array of strings`)
      );
    }
  }
  return failures;
}

export const objectEvaluator: ConstraintEvaluator = {
  name: 'object-shape',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    if (!isJsonObject(instance)) return [];
    const failures: FailureRecord[] = [];
    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      switch (keyword) {
        case 'required':
          failures.push(...required(value, instance, scope));
          break;
        case 'properties':
          failures.push(...properties(node, value, instance, scope));
          break;
        case 'patternProperties':
          failures.push(...patternProperties(node, value, instance, scope));
          break;
        case 'additionalProperties':
          failures.push(...additionalProperties(node, instance, scope));
          break;
        case 'propertyNames':
          failures.push(...propertyNames(node, instance, scope));
          break;
        default:
          failures.push(...dependencies(node, keyword, value, instance, scope));
      }
    }
    return failures;
  },
};
