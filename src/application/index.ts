export { evaluateExpression, evaluateOrThrow } from './evaluate.js';
export type { Verdict, EvaluateOptions } from './evaluate.js';
export { ProgramCache } from './program-cache.js';
export { evaluateEvent } from './rule-engine.js';
export type { RuleEngineOptions, EngineLogger } from './rule-engine.js';
export { StaticConfigProvider } from './config-provider.js';
export type { EngineConfigProvider } from './config-provider.js';
export {
  valueKindSchema,
  declarationSchema,
  evaluateRequestSchema,
  checkRequestSchema,
  expressionRuleSchema,
  matchRequestSchema,
} from './rule-schema.js';
export type {
  DeclarationInput,
  EvaluateRequest,
  CheckRequest,
  ExpressionRuleInput,
  MatchRequest,
} from './rule-schema.js';
