/**
 * Constraint rules: declared content requirements checked independently of
 * similarity scoring. `respect_consent` also runs undeclared whenever the spec
 * carries consent data.
 */

import { CheckResult } from './types';
import { channelKind, wordsForLanguage } from '../config/lexicon';
import { RuleContext, RuleHandler, RuleRegistry } from './rule-registry';
import { check } from './check-result';
import { consentFor } from './record-views';
import { containsFolded, containsWord } from './text';

const RESPECT_CONSENT = 'respect_consent';

function describe(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : JSON.stringify(value) ?? String(value);
}

function expectBoolean(key: string, value: unknown): CheckResult | boolean {
  if (typeof value === 'boolean') return value;
  return check(`constraint_${key}`, 'failed', `Constraint ${key} expects a boolean (got ${describe(value)})`);
}

const includeOptOutInstructions: RuleHandler<unknown> = (ctx, value) => {
  const flag = expectBoolean('include_opt_out_instructions', value);
  if (typeof flag !== 'boolean') return flag;
  if (!flag) return null;

  const { channel, body, unsubscribe } = ctx.output.message;
  if (channel === null || body === null) {
    return check('constraint_opt_out', 'passed', 'No message sent; opt-out instructions not required');
  }

  switch (channelKind(ctx.lexicon, channel)) {
    case 'sms': {
      const tokens = wordsForLanguage(ctx.lexicon.optOut.smsTokens, ctx.lexicon, ctx.language);
      const found = tokens.find((t) => containsWord(body, t));
      return found
        ? check('constraint_opt_out_sms', 'passed', `SMS opt-out instruction: ${found} found`)
        : check(
          'constraint_opt_out_sms',
          'failed',
          `SMS opt-out instruction missing (expected one of: ${tokens.join(', ') || 'none configured'})`,
        );
    }
    case 'email': {
      if (unsubscribe?.trim()) {
        return check('constraint_opt_out_email', 'passed', 'Email opt-out instruction: unsubscribe field present');
      }
      const phrases = wordsForLanguage(ctx.lexicon.optOut.emailPhrases, ctx.lexicon, ctx.language);
      const found = phrases.find((p) => containsFolded(body, p));
      return found
        ? check('constraint_opt_out_email', 'passed', `Email opt-out instruction: '${found}' found`)
        : check('constraint_opt_out_email', 'failed', 'Email opt-out instruction missing');
    }
    default:
      return check('constraint_opt_out', 'warning', `No opt-out rule for channel '${channel}'`);
  }
};

const primaryCta: RuleHandler<unknown> = (ctx, value) => {
  if (typeof value !== 'string' || value.trim() === '') {
    return check('constraint_primary_cta', 'failed', `Constraint primary_cta expects a CTA type (got ${describe(value)})`);
  }
  const actual = ctx.output.message.ctaType;
  return check(
    'constraint_primary_cta',
    actual === value ? 'passed' : 'failed',
    `Primary CTA: expected '${value}', got '${actual ?? 'none'}'`,
    { expected: value, actual },
  );
};

/** A non-null body on a channel marked not opted in always fails */
const respectConsent: RuleHandler<unknown> = (ctx) => {
  const name = `constraint_${RESPECT_CONSENT}`;
  const { channel, body } = ctx.output.message;

  if (body === null) {
    return check(name, 'passed', 'Consent respected: no message sent');
  }
  if (channel === null) {
    return check(name, 'failed', 'Consent cannot be verified: message body produced without a channel');
  }
  if (!ctx.consent) {
    return check(name, 'warning', `No consent data; consent for '${channel}' cannot be verified`);
  }

  switch (consentFor(ctx.consent, channel)) {
    case true:
      return check(name, 'passed', `Consent respected: '${channel}' opted in`);
    case false:
      return check(name, 'failed', `Consent violated: message sent on '${channel}' without opt-in`);
    default:
      return check(name, 'warning', `No consent recorded for channel '${channel}'`);
  }
};

const localeApplied: RuleHandler<unknown> = (ctx, value) => {
  const flag = expectBoolean('locale_applied', value);
  if (typeof flag !== 'boolean') return flag;
  if (!flag) return null;

  const name = 'constraint_locale_applied';
  const { language } = ctx;
  const { body } = ctx.output.message;

  if (language === ctx.lexicon.defaultLanguage) {
    return check(name, 'passed', `Default locale '${language}'; no localization required`);
  }
  if (!body) {
    return check(name, 'passed', 'No message body to localize');
  }
  if (!ctx.scorer.hasMarkers(language)) {
    return check(name, 'warning', `No marker words configured for language '${language}'`);
  }

  const hits = ctx.scorer.countMarkers(body, language);
  return hits > 0
    ? check(name, 'passed', `Locale '${language}' applied: ${hits} marker word(s) found`)
    : check(name, 'failed', `Locale '${language}' not applied: no marker words found`);
};

export function createConstraintRegistry(): RuleRegistry<unknown> {
  return new RuleRegistry<unknown>('constraint')
    .register('include_opt_out_instructions', includeOptOutInstructions)
    .register('primary_cta', primaryCta)
    .register(RESPECT_CONSENT, respectConsent)
    .register('locale_applied', localeApplied);
}

export const defaultConstraintRegistry = createConstraintRegistry();

/**
 * Declared constraints in declaration order, then the implicit consent check
 * when it was not declared and the spec carries consent data.
 */
export function validateConstraints(
  ctx: RuleContext,
  declared: Record<string, unknown>,
  registry: RuleRegistry<unknown> = defaultConstraintRegistry,
): CheckResult[] {
  const checks: CheckResult[] = [];

  for (const [key, value] of Object.entries(declared)) {
    const handler = registry.get(key);
    if (!handler) {
      checks.push(check(`constraint_${key}`, 'warning', `Unrecognized constraint '${key}' ignored`));
      continue;
    }
    const result = handler(ctx, value);
    if (result) checks.push(result);
  }

  const consentRule = registry.get(RESPECT_CONSENT);
  if (consentRule && ctx.consent && !(RESPECT_CONSENT in declared)) {
    const result = consentRule(ctx, true);
    if (result) checks.push(result);
  }

  return checks;
}
