/**
 * Comparator
 *
 * Structural and textual comparison of the agent's message and next action
 * against the expected ones. Pure: no I/O, no shared state.
 */

import { CheckResult } from './types';
import { Lexicon, channelKind } from '../config/lexicon';
import { ActionView, MessageView, OutputView } from './record-views';
import { check, formatPercent, similarityStatus } from './check-result';
import { similarity } from './similarity';

export interface ExpectedView {
  message: MessageView;
  action: ActionView;
}

const show = (value: string | null): string => value ?? 'none';

export function compareChannel(expected: MessageView, actual: MessageView): CheckResult {
  return check(
    'channel_match',
    expected.channel === actual.channel ? 'passed' : 'failed',
    `Channel: expected '${show(expected.channel)}', got '${show(actual.channel)}'`,
    { expected: expected.channel, actual: actual.channel },
  );
}

/** Only for email-like expected channels with an expected subject */
export function compareSubject(expected: MessageView, actual: MessageView, lexicon: Lexicon): CheckResult | null {
  if (channelKind(lexicon, expected.channel) !== 'email' || expected.subject === null) return null;

  if (actual.subject === null) {
    return check('subject_match', 'failed', `Subject missing: expected '${expected.subject}'`, {
      expected: expected.subject,
      actual: null,
    });
  }

  const ratio = similarity(expected.subject, actual.subject);
  return check('subject_match', similarityStatus(ratio), `Subject similarity: ${formatPercent(ratio)}`, {
    expected: expected.subject,
    actual: actual.subject,
    similarity: ratio,
  });
}

export function compareBody(expected: MessageView, actual: MessageView): CheckResult {
  if (expected.body === null && actual.body === null) {
    return check('body_similarity', 'passed', 'Both bodies are null (no message sent)', { similarity: 1 });
  }
  if (expected.body === null) {
    return check('body_similarity', 'failed', 'Body: expected no message, got a message body', {
      expected: null,
      actual: actual.body,
      similarity: 0,
    });
  }
  if (actual.body === null) {
    return check('body_similarity', 'failed', 'Body: expected a message body, got none', {
      expected: expected.body,
      actual: null,
      similarity: 0,
    });
  }

  const ratio = similarity(expected.body, actual.body);
  return check('body_similarity', similarityStatus(ratio), `Body similarity: ${formatPercent(ratio)}`, {
    expected: expected.body,
    actual: actual.body,
    similarity: ratio,
  });
}

function compareType(name: string, label: string, expected: string | null, actual: string | null): CheckResult | null {
  if (expected === null) return null;
  return check(
    name,
    expected === actual ? 'passed' : 'failed',
    `${label}: expected '${expected}', got '${show(actual)}'`,
    { expected, actual },
  );
}

export function compareCta(expected: MessageView, actual: MessageView): CheckResult | null {
  return compareType('cta_type_match', 'CTA type', expected.ctaType, actual.ctaType);
}

export function compareNextAction(expected: ActionView, actual: ActionView): CheckResult | null {
  return compareType('next_action_type_match', 'Next action', expected.type, actual.type);
}

/** All output_match checks, in report order */
export function compareOutput(expected: ExpectedView, actual: OutputView, lexicon: Lexicon): CheckResult[] {
  const checks: Array<CheckResult | null> = [
    compareChannel(expected.message, actual.message),
    compareSubject(expected.message, actual.message, lexicon),
    compareBody(expected.message, actual.message),
    compareCta(expected.message, actual.message),
    compareNextAction(expected.action, actual.action),
  ];
  return checks.filter((c): c is CheckResult => c !== null);
}
