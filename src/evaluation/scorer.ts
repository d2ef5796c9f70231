/**
 * Scorer
 *
 * Quality scores computed from the spec and the agent's message:
 *   - body_similarity       (0-1)
 *   - personalization_score (0-1, coverage of profile fields present)
 *   - locale_accuracy       (0-1, marker-word density for non-default languages)
 *   - safety_violations     (count of denylist matches)
 */

import { EvalSpec, Metrics, ScoreCard } from './types';
import { Lexicon } from '../config/lexicon';
import { ExpectedView } from './comparator';
import { MessageView, readLanguage, readProfile, readSection } from './record-views';
import { nullableSimilarity } from './similarity';
import { asFiniteNumber, asString, asStringList, containsFolded, wordCount, wordTokens, foldText } from './text';

/** Share of words expected to be language-distinctive */
export const LOCALE_WORD_FACTOR = 0.3;

const AMENITY_KEYS = ['amenity_interest', 'amenities', 'amenity_interests'];
const CITY_KEYS = ['city', 'city_interest', 'location'];
const UNIT_KEYS = ['unit', 'unit_number'];

/** Score keys a caller may supply pre-computed in Metrics */
export const SUPPLIABLE_SCORES = ['personalization_score', 'locale_accuracy', 'safety_violations'] as const;
export type SuppliableScore = (typeof SUPPLIABLE_SCORES)[number];

export interface PersonalizationBreakdown {
  score: number;
  earned: number;
  applicable: number;
  matched: string[];
  missed: string[];
}

function firstPresent(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

export class Scorer {
  private readonly safetyPatterns: Array<{ label: string; regex: RegExp }>;
  private readonly markerSets = new Map<string, Set<string>>();

  constructor(private readonly lexicon: Lexicon) {
    this.safetyPatterns = lexicon.safetyDenylist.map((rule) => ({
      label: rule.label,
      regex: new RegExp(rule.pattern, 'gi'),
    }));
    for (const [language, words] of Object.entries(lexicon.localeMarkers)) {
      this.markerSets.set(language, new Set(words.map(foldText)));
    }
  }

  score(spec: EvalSpec, expected: ExpectedView, actual: MessageView): ScoreCard {
    return {
      body_similarity: this.bodySimilarity(expected.message.body, actual.body),
      personalization_score: this.personalization(spec, actual.body).score,
      locale_accuracy: this.localeAccuracy(spec, actual.body),
      safety_violations: this.safetyViolations(actual.body),
    };
  }

  /** Both null → 1, exactly one null → 0 */
  bodySimilarity(expected: string | null, actual: string | null): number {
    return nullableSimilarity(expected, actual);
  }

  /**
   * One point per applicable profile field found in the body. With no
   * applicable fields the score is 1.0: treated as trivially satisfied.
   */
  personalization(spec: EvalSpec, body: string | null): PersonalizationBreakdown {
    const profile = readProfile(spec);
    const input = readSection(spec, 'input') ?? {};
    const text = body ?? '';
    const matched: string[] = [];
    const missed: string[] = [];

    const award = (field: string, hit: boolean): void => {
      (hit ? matched : missed).push(field);
    };

    const firstName = asString(profile.first_name)?.trim();
    if (firstName) award('first_name', containsFolded(text, firstName));

    const amenities = asStringList(firstPresent(profile, AMENITY_KEYS));
    if (amenities.length > 0) award('amenity', amenities.some((a) => containsFolded(text, a)));

    const unitValue = firstPresent(profile, UNIT_KEYS) ?? firstPresent(input, UNIT_KEYS);
    const unit = typeof unitValue === 'number' ? String(unitValue) : asString(unitValue)?.trim();
    if (unit && this.isResident(spec)) award('unit', containsFolded(text, unit));

    const city = asString(firstPresent(profile, CITY_KEYS))?.trim();
    if (city) award('city', containsFolded(text, city));

    const applicable = matched.length + missed.length;
    return {
      score: applicable > 0 ? matched.length / applicable : 1,
      earned: matched.length,
      applicable,
      matched,
      missed,
    };
  }

  /**
   * Default language → 1.0. Otherwise marker words over 30% of the word count,
   * capped at 1. No body or an empty one → 1.0; no markers configured for the
   * language → 0.
   */
  localeAccuracy(spec: EvalSpec, body: string | null): number {
    const language = readLanguage(spec, this.lexicon.defaultLanguage);
    if (language === this.lexicon.defaultLanguage || !body) return 1;

    const markers = this.markerSets.get(language);
    if (!markers || markers.size === 0) return 0;

    const hits = this.countMarkers(body, language);
    const denominator = Math.max(wordCount(body) * LOCALE_WORD_FACTOR, 1);
    return Math.min(1, hits / denominator);
  }

  countMarkers(body: string, language: string): number {
    const markers = this.markerSets.get(language);
    if (!markers) return 0;
    return wordTokens(body).filter((token) => markers.has(token)).length;
  }

  hasMarkers(language: string): boolean {
    return (this.markerSets.get(language)?.size ?? 0) > 0;
  }

  safetyViolations(body: string | null): number {
    return this.safetyMatches(body).length;
  }

  /** Every denylist hit, labelled */
  safetyMatches(body: string | null): Array<{ label: string; text: string }> {
    if (!body) return [];
    const hits: Array<{ label: string; text: string }> = [];
    for (const { label, regex } of this.safetyPatterns) {
      for (const match of body.matchAll(regex)) {
        hits.push({ label, text: match[0] });
      }
    }
    return hits;
  }

  isResident(spec: EvalSpec): boolean {
    const persona = asString(spec.persona)?.toLowerCase();
    if (!persona) return false;
    return this.lexicon.residentPersonas.some((p) => persona.includes(p));
  }
}

/**
 * Merge caller-supplied metrics over computed scores. A supplied value wins
 * only when it is a finite number; anything else keeps the computed score.
 */
export function effectiveScores(computed: ScoreCard, metrics: Metrics | null | undefined): ScoreCard {
  const merged: ScoreCard = { ...computed };
  for (const key of SUPPLIABLE_SCORES) {
    const supplied = asFiniteNumber(metrics?.[key]);
    if (supplied !== null) merged[key] = supplied;
  }
  return merged;
}
