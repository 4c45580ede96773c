import { vi } from 'vitest';
import type { DetectionEvent, ExpressionRule } from '../../src/domain/index.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<DetectionEvent> = {}): DetectionEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `test-${counter}`,
    data: overrides.data ?? JSON.stringify({ action: 'login', user: 'alice', attempts: 3 }),
    declarations: overrides.declarations ?? [],
  };
}

export function makeRule(overrides: Partial<ExpressionRule> = {}): ExpressionRule {
  counter++;
  return {
    id: overrides.id ?? `rule-${counter}`,
    name: overrides.name ?? 'Test rule',
    description: overrides.description ?? '',
    severity: overrides.severity ?? 'medium',
    expression: overrides.expression ?? 'true',
    enabled: overrides.enabled ?? true,
  };
}

export function fakeLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

/** Fixed "now" for deterministic `detected_at` values. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();
