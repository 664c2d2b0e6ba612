import { z } from 'zod';
import { ScamType } from '@decoy-agent/shared/types';
import keywordData from './data/detection-keywords.json';

const keywordSchema = z.object({
  scamIndicators: z.array(z.string().min(1)).min(1),
  scamTypes: z.array(
    z.object({
      type: z.nativeEnum(ScamType),
      keywords: z.array(z.string().min(1)).min(1),
    })
  ),
});

const keywords = keywordSchema.parse(keywordData);

/** Indicator hits needed before a message counts as a scam. */
export const MIN_INDICATOR_HITS = 2;
const BASE_CONFIDENCE = 0.5;
const CONFIDENCE_PER_HIT = 0.1;
const MAX_CONFIDENCE = 0.9;

export interface KeywordDetection {
  isScam: boolean;
  confidence: number;
  scamType: ScamType;
  indicators: string[];
}

/**
 * Indicators found in `text`, in vocabulary order. Matching is by substring
 * on the lowercased text, so "accounts" counts for "account".
 */
export function matchIndicators(text: string): string[] {
  const lowered = text.toLowerCase();
  return keywords.scamIndicators.filter((indicator) => lowered.includes(indicator));
}

/**
 * First category whose keywords appear in `text`; categories are checked in
 * file order and `other` is the default.
 */
export function quickScamType(text: string): ScamType {
  const lowered = text.toLowerCase();
  const match = keywords.scamTypes.find((entry) =>
    entry.keywords.some((keyword) => lowered.includes(keyword))
  );
  return match?.type ?? ScamType.OTHER;
}

export function detectByKeywords(text: string): KeywordDetection {
  const indicators = matchIndicators(text);
  const hits = indicators.length;
  return {
    isScam: hits >= MIN_INDICATOR_HITS,
    confidence: hits === 0 ? 0 : Math.min(BASE_CONFIDENCE + CONFIDENCE_PER_HIT * hits, MAX_CONFIDENCE),
    scamType: quickScamType(text),
    indicators,
  };
}

