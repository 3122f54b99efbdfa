/**
 * Classifier module: ordered-group transaction labelling.
 */

export { classify, classifyAll, SOURCE_GROUP_ID } from './classify.js';
export { compileRuleTable } from './compile.js';
export { validatePattern, checkPatternCollision, collectPatterns } from './validate.js';
export { matchesAny } from './match.js';
export type {
    ClassificationStats,
    ClassificationOutput,
    CompiledRuleTable,
    PatternValidationResult,
    ExistingPattern,
    CollisionResult,
} from './types.js';
