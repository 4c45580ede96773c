export type { DetectionEvent } from './event.js';
export type { ExpressionRule, RuleResult, Anomaly, Severity } from './rules/index.js';
