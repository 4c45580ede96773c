import type { Logger } from 'pino';
import type { DetectionEvent } from '../domain/index.js';
import { EvaluationError } from '../domain/expression/index.js';
import type { ExpressionRule, RuleResult, Anomaly } from '../domain/rules/index.js';
import type { EngineConfigProvider } from './config-provider.js';
import { evaluateExpression, type Verdict } from './evaluate.js';
import type { ProgramCache } from './program-cache.js';

/** The logging surface the engine uses; satisfied by pino and by `fastify.log`. */
export type EngineLogger = Pick<Logger, 'error' | 'warn' | 'debug'>;

export interface RuleEngineOptions {
  readonly log: EngineLogger;
  readonly config?: EngineConfigProvider;
  readonly cache?: ProgramCache;
  /** Clock for `detected_at`. */
  readonly nowFn?: () => number;
}

/**
 * Rule engine: evaluates an event against a list of expression rules.
 *
 * Pure orchestration:
 * 1. Reads the disabled rule ids from the config provider.
 * 2. Runs each remaining rule's expression through the pipeline.
 * 3. Collects and returns all RuleResults.
 *
 * A rule that cannot be applied to the event (bad expression, missing
 * variable, non-boolean result) is logged and reported as not triggered;
 * the other rules still run. An unexpected failure is logged at error level
 * and reported as an EvaluationError for that rule alone. Callers decide what to do with the results
 * (log, persist, alert).
 */
export function evaluateEvent(
  event: DetectionEvent,
  rules: readonly ExpressionRule[],
  options: RuleEngineOptions,
): { results: RuleResult[]; anomalies: Anomaly[] } {
  const { log, config, cache } = options;
  const nowFn = options.nowFn ?? Date.now;
  const disabled = new Set(config?.disabledRuleIds() ?? []);

  const results: RuleResult[] = [];
  const anomalies: Anomaly[] = [];

  for (const rule of rules) {
    if (!rule.enabled || disabled.has(rule.id)) continue;

    let verdict: Verdict;
    try {
      verdict = evaluateExpression(event.data, rule.expression, {
        declarations: event.declarations,
        cache,
      });
    } catch (err: unknown) {
      log.error({ err, rule_id: rule.id, event_id: event.event_id }, 'Failed to evaluate rule');
      const reason = err instanceof Error ? err.message : String(err);
      results.push({
        triggered: false,
        rule_id: rule.id,
        error: new EvaluationError('unexpected failure while evaluating rule', { reason }, { cause: err }),
      });
      continue;
    }

    if (!verdict.ok) {
      log.warn(
        { rule_id: rule.id, event_id: event.event_id, code: verdict.error.code, context: verdict.error.context },
        verdict.error.message,
      );
      results.push({ triggered: false, rule_id: rule.id, error: verdict.error });
      continue;
    }

    if (!verdict.matched) {
      results.push({ triggered: false, rule_id: rule.id });
      continue;
    }

    const anomaly: Anomaly = {
      rule_id: rule.id,
      event_id: event.event_id,
      severity: rule.severity,
      message: `Rule "${rule.name}" matched: ${rule.expression}`,
      detected_at: new Date(nowFn()).toISOString(),
    };
    results.push({ triggered: true, rule_id: rule.id, anomaly });
    anomalies.push(anomaly);
  }

  log.debug(
    { event_id: event.event_id, evaluated: results.length, matched: anomalies.length },
    'Event evaluated',
  );

  return { results, anomalies };
}
