import path from 'path';
import { loadLexicon } from '../src/config/lexicon';
import { Scorer, effectiveScores } from '../src/evaluation/scorer';
import { RuleContext } from '../src/evaluation/rule-registry';
import { readExpected, readLanguage, readOutput, readSection } from '../src/evaluation/record-views';
import { AgentOutput, EvalSpec, Metrics } from '../src/evaluation/types';

export const LEXICON_PATH = path.resolve(__dirname, '..', 'config', 'lexicon.yaml');
export const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');

export const lexicon = loadLexicon(LEXICON_PATH);

/** Rule context for one task, built the way the runner builds it */
export function ruleContext(spec: EvalSpec, output: AgentOutput | null, metrics?: Metrics): RuleContext {
  const scorer = new Scorer(lexicon);
  const actual = readOutput(output);
  const computed = scorer.score(spec, readExpected(spec), actual.message);
  return {
    spec,
    output: actual,
    scores: effectiveScores(computed, metrics),
    lexicon,
    scorer,
    language: readLanguage(spec, lexicon.defaultLanguage),
    consent: readSection(spec, 'consent'),
  };
}

export function smsOutput(body: string | null, extra: Partial<AgentOutput> = {}): AgentOutput {
  return { next_message: { channel: body === null ? null : 'sms', body }, ...extra };
}
