import { AgentOutput, CheckCategory, EvalSpec } from './types';
import { asString, asStringList, isRecord } from './text';

/**
 * Typed, null-normalized views over loosely-typed records. Spec files and agent
 * outputs are hand-authored or model-generated, so a field of the wrong type
 * reads as absent rather than throwing. `sectionProblems` reports the spec
 * sections that were present but unreadable.
 */

export interface MessageView {
  /** Lower-cased channel; null is the "no message" sentinel */
  channel: string | null;
  subject: string | null;
  body: string | null;
  ctaType: string | null;
  unsubscribe: string | null;
}

export interface ActionView {
  type: string | null;
  value: unknown;
}

export interface OutputView {
  message: MessageView;
  action: ActionView;
  /** Null when the collaborator did not report states */
  states: string[] | null;
}

const NO_MESSAGE_CHANNELS = new Set(['', 'none', 'null']);

export function normalizeChannel(value: unknown): string | null {
  const raw = asString(value);
  if (raw === null) return null;
  const channel = raw.trim().toLowerCase();
  return NO_MESSAGE_CHANNELS.has(channel) ? null : channel;
}

export function readMessage(value: unknown): MessageView {
  const msg: Record<string, unknown> = isRecord(value) ? value : {};
  const cta = isRecord(msg.cta) ? msg.cta : null;
  return {
    channel: normalizeChannel(msg.channel),
    subject: asString(msg.subject),
    body: asString(msg.body),
    ctaType: cta ? asString(cta.type) : null,
    unsubscribe: asString(msg.unsubscribe),
  };
}

export function readAction(value: unknown): ActionView {
  const action = isRecord(value) ? value : null;
  return {
    type: action ? asString(action.type) : null,
    value: action?.value ?? null,
  };
}

export function readOutput(output: AgentOutput | null | undefined): OutputView {
  const raw: Record<string, unknown> = isRecord(output) ? output : {};
  return {
    message: readMessage(raw.next_message),
    action: readAction(raw.next_action),
    states: Array.isArray(raw.states) ? asStringList(raw.states) : null,
  };
}

export function readExpected(spec: EvalSpec): { message: MessageView; action: ActionView } {
  const expected: Record<string, unknown> = isRecord(spec.expected) ? spec.expected : {};
  return {
    message: readMessage(expected.next_message),
    action: readAction(expected.next_action),
  };
}

export function readSection(spec: EvalSpec, key: 'consent' | 'input' | 'thresholds'): Record<string, unknown> | null {
  const section = spec[key];
  return isRecord(section) ? section : null;
}

export function readProfile(spec: EvalSpec): Record<string, unknown> {
  const input = readSection(spec, 'input');
  return input && isRecord(input.profile) ? input.profile : {};
}

export function readLanguage(spec: EvalSpec, defaultLanguage: string): string {
  const input = readSection(spec, 'input');
  const language = input ? asString(input.language) : null;
  return language?.trim() ? language.trim().toLowerCase() : defaultLanguage;
}

export function readConstraints(spec: EvalSpec): Record<string, unknown> {
  const assertions: Record<string, unknown> = isRecord(spec.assertions) ? spec.assertions : {};
  return isRecord(assertions.constraints) ? assertions.constraints : {};
}

export function readRequiredStates(spec: EvalSpec): string[] {
  const assertions: Record<string, unknown> = isRecord(spec.assertions) ? spec.assertions : {};
  return asStringList(assertions.required_states);
}

/** Consent key folded for lookup: lower-cased, `_opt_in` suffix removed */
function consentKey(key: string): string {
  return key.trim().toLowerCase().replace(/_opt_in$/, '');
}

/**
 * Consent for a channel: `consent[channel]`, falling back to
 * `consent[channel + "_opt_in"]`, with keys matched case-insensitively.
 * Undefined when not recorded.
 */
export function consentFor(consent: Record<string, unknown> | null, channel: string): boolean | undefined {
  if (!consent) return undefined;
  const wanted = consentKey(channel);
  let optIn: boolean | undefined;
  for (const [key, value] of Object.entries(consent)) {
    if (typeof value !== 'boolean' || consentKey(key) !== wanted) continue;
    if (!/_opt_in$/i.test(key.trim())) return value;
    if (optIn === undefined) optIn = value;
  }
  return optIn;
}

/** Channels with an explicit opt-in, lower-cased and without the `_opt_in` suffix */
export function consentedChannels(consent: Record<string, unknown> | null): string[] {
  if (!consent) return [];
  const channels = Object.entries(consent)
    .filter(([, v]) => v === true)
    .map(([k]) => consentKey(k));
  return Array.from(new Set(channels));
}

export interface SectionProblem {
  category: CheckCategory;
  name: string;
  message: string;
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function presentButNotMapping(value: unknown): boolean {
  return value !== undefined && value !== null && !isRecord(value);
}

const MAPPING_SECTIONS: ReadonlyArray<{ key: string; category: CheckCategory; name: string }> = [
  { key: 'expected', category: 'output_match', name: 'expected_section_malformed' },
  { key: 'input', category: 'output_match', name: 'input_section_malformed' },
  { key: 'thresholds', category: 'threshold', name: 'threshold_section_malformed' },
  { key: 'assertions', category: 'assertion', name: 'assertion_section_malformed' },
  { key: 'consent', category: 'constraint', name: 'consent_section_malformed' },
];

/**
 * Sections present with the wrong type. Each one reads as absent, so it is
 * reported here as a failed check in the category it would have fed.
 */
export function sectionProblems(spec: EvalSpec): SectionProblem[] {
  const problems: SectionProblem[] = [];
  const raw: Record<string, unknown> = spec;

  for (const { key, category, name } of MAPPING_SECTIONS) {
    const value = raw[key];
    if (presentButNotMapping(value)) {
      problems.push({ category, name, message: `Section '${key}' must be a mapping (got ${typeName(value)})` });
    }
  }

  const assertions = raw.assertions;
  if (!isRecord(assertions)) return problems;

  if (presentButNotMapping(assertions.constraints)) {
    problems.push({
      category: 'constraint',
      name: 'constraint_section_malformed',
      message: `Section 'assertions.constraints' must be a mapping (got ${typeName(assertions.constraints)})`,
    });
  }

  const states = assertions.required_states;
  if (Array.isArray(states)) {
    const entries: unknown[] = states;
    entries.forEach((state, index) => {
      if (typeof state !== 'string') {
        problems.push({
          category: 'assertion',
          name: 'required_states_malformed',
          message: `required_states[${index}] must be a state name (got ${typeName(state)})`,
        });
      }
    });
  } else if (states !== undefined && states !== null && typeof states !== 'string') {
    problems.push({
      category: 'assertion',
      name: 'required_states_malformed',
      message: `Section 'assertions.required_states' must be a list (got ${typeName(states)})`,
    });
  }

  return problems;
}
