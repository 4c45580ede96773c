import type { ExpressionError } from '../expression/index.js';

/** Severity levels for detected anomalies. */
export type Severity = 'low' | 'medium' | 'high' | 'critical';

/**
 * An anomaly raised by a matching rule.
 *
 * Contains enough context for downstream alerting without
 * carrying the full event payload.
 */
export interface Anomaly {
  readonly rule_id: string;
  readonly event_id: string;
  readonly severity: Severity;
  readonly message: string;
  readonly detected_at: string; // ISO-8601
}

/**
 * Result of evaluating a single rule against an event.
 *
 * `triggered === false` means the event did not match, or the rule could
 * not be applied to it (`error` is then set).
 * `triggered === true` includes the anomaly detail.
 */
export type RuleResult =
  | { readonly triggered: false; readonly rule_id: string; readonly error?: ExpressionError }
  | { readonly triggered: true; readonly rule_id: string; readonly anomaly: Anomaly };

/**
 * A detection rule whose condition is a boolean expression over the
 * event document, e.g. `action == "login" && safe("geo.country", "") != "NL"`.
 */
export interface ExpressionRule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  readonly expression: string;
  readonly enabled: boolean;
}
