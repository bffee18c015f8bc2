import { arrayEvaluator } from './array.js';
import { compositeEvaluator } from './composite.js';
import { conditionalEvaluator } from './conditional.js';
import { enumEvaluator } from './enum.js';
import { lengthEvaluator } from './length.js';
import { objectEvaluator } from './object.js';
import { patternEvaluator } from './pattern.js';
import { rangeEvaluator } from './range.js';
import { referenceEvaluator } from './reference.js';
import { typeEvaluator } from './type.js';
import type { ConstraintEvaluator } from './types.js';

export type { ConstraintEvaluator } from './types.js';
export { evaluateBooleanSchema } from './boolean.js';
export {
  evaluateChild,
  failure,
  invalidKeyword,
  matchesChild,
  ownedKeywords,
  readKeyword,
} from './scope.js';
export { isMultipleOf } from './range.js';
export { matchesType } from './type.js';

/** Built-in evaluators; a keyword belongs to the first evaluator listing it. */
export const DEFAULT_EVALUATORS: readonly ConstraintEvaluator[] = [
  referenceEvaluator,
  typeEvaluator,
  enumEvaluator,
  rangeEvaluator,
  lengthEvaluator,
  patternEvaluator,
  compositeEvaluator,
  conditionalEvaluator,
  objectEvaluator,
  arrayEvaluator,
];
