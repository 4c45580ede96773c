/**
 * Settings the rule engine reads before it runs any expression.
 *
 * The expression pipeline itself never touches configuration; the engine
 * asks its provider once per event and passes plain values down.
 */
export interface EngineConfigProvider {
  /** Ids of rules that must not be evaluated. */
  disabledRuleIds(): readonly string[];
}

/** Provider over a fixed list, e.g. the one loaded from config/engine.yaml at boot. */
export class StaticConfigProvider implements EngineConfigProvider {
  private readonly disabled: readonly string[];

  constructor(disabled: readonly string[] = []) {
    this.disabled = [...disabled];
  }

  disabledRuleIds(): readonly string[] {
    return this.disabled;
  }
}
