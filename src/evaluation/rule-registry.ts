import { CheckResult, EvalSpec, ScoreCard } from './types';
import { Lexicon } from '../config/lexicon';
import { OutputView } from './record-views';
import { Scorer } from './scorer';
import { logger } from '../observability/logger';

/** Everything a rule may look at for one task */
export interface RuleContext {
  spec: EvalSpec;
  output: OutputView;
  /** Effective scores: supplied metrics over computed values */
  scores: ScoreCard;
  lexicon: Lexicon;
  scorer: Scorer;
  /** Target language, lower-cased, defaulted */
  language: string;
  consent: Record<string, unknown> | null;
}

/** Returns null when the rule does not apply (e.g. constraint declared false) */
export type RuleHandler<T> = (ctx: RuleContext, value: T) => CheckResult | null;

export type RuleKind = 'constraint' | 'assertion';

/** Key → validation function; unregistered keys are the caller's fallback */
export class RuleRegistry<T> {
  private readonly rules = new Map<string, RuleHandler<T>>();

  constructor(readonly kind: RuleKind) {}

  register(key: string, handler: RuleHandler<T>): this {
    if (this.rules.has(key)) {
      logger.warn({ kind: this.kind, key }, 'Overwriting existing rule registration');
    }
    this.rules.set(key, handler);
    return this;
  }

  get(key: string): RuleHandler<T> | undefined {
    return this.rules.get(key);
  }

  has(key: string): boolean {
    return this.rules.has(key);
  }

  keys(): string[] {
    return Array.from(this.rules.keys());
  }
}
