/**
 * Core domain types for an event under evaluation.
 *
 * They carry no framework dependencies.
 */
import type { VariableDeclaration } from './expression/index.js';

/**
 * An incoming event as the rule engine sees it.
 *
 * `data` stays in its raw JSON form: every rule builds its own
 * environment from it, and path accessors read the text directly.
 */
export interface DetectionEvent {
  readonly event_id: string;
  readonly data: string;
  /** Typed host values exposed to every rule alongside the document keys. */
  readonly declarations?: readonly VariableDeclaration[];
}
