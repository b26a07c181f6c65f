export * from './model.js';
export * from './errors.js';
export { decomposeLogic, parseCondition, type Decomposition } from './decomposeLogic.js';
export { parseLine, parseLineOrThrow } from './parseLine.js';
export {
  parseStructured,
  parseStructuredInput,
  structuredRuleSchema,
  type StructuredRule,
} from './parseStructured.js';
export { renderAction, renderRule, toStructured } from './serialize.js';
