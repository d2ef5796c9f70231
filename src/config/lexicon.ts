import * as fs from 'fs';
import yaml from 'js-yaml';
import Ajv, { SchemaObject } from 'ajv';
import { logger } from '../observability/logger';

/**
 * Evaluation lexicon: channel kinds, opt-out wording, locale marker words and
 * the safety denylist. Loaded once and injected into the scorer and the rule
 * engine; every loaded lexicon is deeply frozen.
 */

export interface SafetyRule {
  readonly label: string;
  /** Case-insensitive regular expression source */
  readonly pattern: string;
}

export type ChannelKind = 'sms' | 'email' | 'other';

export interface Lexicon {
  readonly defaultLanguage: string;
  readonly channels: {
    readonly sms: readonly string[];
    readonly email: readonly string[];
  };
  readonly residentPersonas: readonly string[];
  readonly optOut: {
    readonly smsTokens: Readonly<Record<string, readonly string[]>>;
    readonly emailPhrases: Readonly<Record<string, readonly string[]>>;
  };
  readonly localeMarkers: Readonly<Record<string, readonly string[]>>;
  readonly safetyDenylist: readonly SafetyRule[];
}

/** Raw shape of config/lexicon.yaml */
interface LexiconFile {
  default_language: string;
  channels: { sms: string[]; email: string[] };
  resident_personas?: string[];
  opt_out?: {
    sms_tokens?: Record<string, string[]>;
    email_phrases?: Record<string, string[]>;
  };
  locale_markers?: Record<string, string[]>;
  safety_denylist?: Array<{ label: string; pattern: string }>;
}

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };
const languageMap = { type: 'object', additionalProperties: stringList };

const LEXICON_FILE_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['default_language', 'channels'],
  properties: {
    default_language: { type: 'string', minLength: 1 },
    channels: {
      type: 'object',
      required: ['sms', 'email'],
      properties: { sms: stringList, email: stringList },
    },
    resident_personas: stringList,
    opt_out: {
      type: 'object',
      properties: { sms_tokens: languageMap, email_phrases: languageMap },
    },
    locale_markers: languageMap,
    safety_denylist: {
      type: 'array',
      items: {
        type: 'object',
        required: ['label', 'pattern'],
        properties: {
          label: { type: 'string', minLength: 1 },
          pattern: { type: 'string', minLength: 1 },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateLexiconFile = ajv.compile<LexiconFile>(LEXICON_FILE_SCHEMA);

export class LexiconError extends Error {
  constructor(message: string, readonly source?: string) {
    super(message);
    this.name = 'LexiconError';
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Minimal lexicon used when no lexicon file is deployed */
export const BUILT_IN_LEXICON: Lexicon = deepFreeze({
  defaultLanguage: 'en',
  channels: { sms: ['sms'], email: ['email'] },
  residentPersonas: ['resident'],
  optOut: {
    smsTokens: { en: ['STOP'] },
    emailPhrases: { en: ['unsubscribe', 'opt out', 'opt-out', 'reply stop'] },
  },
  localeMarkers: {},
  safetyDenylist: [],
});

function lowerMap(map: Record<string, string[]> | undefined): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [lang, words] of Object.entries(map ?? {})) {
    out[lang.toLowerCase()] = words;
  }
  return out;
}

/** Parse and validate lexicon YAML text */
export function parseLexicon(content: string, source = 'inline'): Lexicon {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    throw new LexiconError(`Invalid lexicon YAML: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  if (!validateLexiconFile(raw)) {
    throw new LexiconError(`Invalid lexicon: ${ajv.errorsText(validateLexiconFile.errors)}`, source);
  }

  for (const rule of raw.safety_denylist ?? []) {
    try {
      new RegExp(rule.pattern, 'gi');
    } catch {
      throw new LexiconError(`Invalid safety pattern for '${rule.label}': ${rule.pattern}`, source);
    }
  }

  return deepFreeze({
    defaultLanguage: raw.default_language.toLowerCase(),
    channels: {
      sms: raw.channels.sms.map((c) => c.toLowerCase()),
      email: raw.channels.email.map((c) => c.toLowerCase()),
    },
    residentPersonas: (raw.resident_personas ?? []).map((p) => p.toLowerCase()),
    optOut: {
      smsTokens: lowerMap(raw.opt_out?.sms_tokens),
      emailPhrases: lowerMap(raw.opt_out?.email_phrases),
    },
    localeMarkers: lowerMap(raw.locale_markers),
    safetyDenylist: (raw.safety_denylist ?? []).map((r) => ({ label: r.label, pattern: r.pattern })),
  });
}

/**
 * Load the lexicon file. A missing file falls back to the built-in lexicon;
 * a present but invalid file throws.
 */
export function loadLexicon(filepath: string): Lexicon {
  if (!fs.existsSync(filepath)) {
    logger.warn({ filepath }, 'Lexicon file not found; using built-in lexicon');
    return BUILT_IN_LEXICON;
  }

  const lexicon = parseLexicon(fs.readFileSync(filepath, 'utf-8'), filepath);
  logger.info(
    {
      filepath,
      languages: Object.keys(lexicon.localeMarkers),
      safetyRules: lexicon.safetyDenylist.length,
    },
    'Lexicon loaded',
  );
  return lexicon;
}

export function channelKind(lexicon: Lexicon, channel: string | null): ChannelKind {
  if (!channel) return 'other';
  if (lexicon.channels.sms.includes(channel)) return 'sms';
  if (lexicon.channels.email.includes(channel)) return 'email';
  return 'other';
}

/** Default-language entries followed by the target language's own entries */
export function wordsForLanguage(
  map: Readonly<Record<string, readonly string[]>>,
  lexicon: Lexicon,
  language: string,
): string[] {
  const merged = [...(map[lexicon.defaultLanguage] ?? []), ...(map[language] ?? [])];
  return Array.from(new Set(merged));
}
