export type { ExpressionRule, RuleResult, Anomaly, Severity } from './types.js';
