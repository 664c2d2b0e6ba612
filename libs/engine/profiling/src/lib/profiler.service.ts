import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  MANIPULATION_TACTICS,
  ManipulationTactic,
  ResponseTactic,
  ScammerProfile,
} from '@decoy-agent/shared/types';
import lexiconData from './data/profiler-lexicon.json';

const phraseList = z.array(z.string().min(1));

const lexiconSchema = z.object({
  aggression: phraseList,
  impatience: phraseList,
  imperativeVerbs: phraseList,
  sophistication: phraseList,
  manipulation: z.object({
    [ManipulationTactic.FEAR]: phraseList,
    [ManipulationTactic.URGENCY]: phraseList,
    [ManipulationTactic.AUTHORITY]: phraseList,
    [ManipulationTactic.GREED]: phraseList,
    [ManipulationTactic.GUILT]: phraseList,
  }),
});

const lexicon = lexiconSchema.parse(lexiconData);

/** Smoothing factor: weight of the newest message against the running score. */
export const PROFILE_ALPHA = 0.4;
const NEAR_DUPLICATE_JACCARD = 0.6;
const REPETITION_WINDOW = 3;
const MANIPULATION_NORMALIZER = 3;
/** Average words per message above which the scammer counts as long-winded. */
const LONG_MESSAGE_WORDS = 15;

const REFERENCE_NUMBER = /\b(?:ref|reference|case|ticket|complaint)\s*(?:no\.?|number|id)?[:\s#-]*[a-z0-9-]*\d[a-z0-9-]{3,}/i;
const FORMAL_PHRASE =
  /\b(?:dear\s+(?:sir|madam|customer)|we\s+regret\s+to\s+inform|as\s+per\s+(?:our|the)\s+records|kindly\s+note|this\s+is\s+to\s+inform)\b/i;

const FORMAL_ADDRESS = /\b(?:sir|madam)\b/i;

interface PhrasePattern {
  phrase: string;
  pattern: RegExp;
}

function compile(phrases: string[]): PhrasePattern[] {
  return phrases.map((raw) => {
    const phrase = raw.toLowerCase();
    const body = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    // Word boundaries only on sides that are alphanumeric, so "??" still matches after a word.
    const head = /^[a-z0-9]/.test(phrase) ? '(?<![a-z0-9])' : '';
    const tail = /[a-z0-9]$/.test(phrase) ? '(?![a-z0-9])' : '';
    return { phrase, pattern: new RegExp(`${head}${body}${tail}`) };
  });
}

function countHits(patterns: PhrasePattern[], lowered: string): number {
  return patterns.filter((p) => p.pattern.test(lowered)).length;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function smooth(raw: number, previous: number): number {
  return clamp01(PROFILE_ALPHA * clamp01(raw) + (1 - PROFILE_ALPHA) * previous);
}

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const w of a) {
    if (b.has(w)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function defaultProfile(): ScammerProfile {
  return {
    aggression: 0.3,
    patience: 0.7,
    sophistication: 0.3,
    manipulation: 0.3,
    tactics: [],
    tacticCounts: {
      [ManipulationTactic.FEAR]: 0,
      [ManipulationTactic.URGENCY]: 0,
      [ManipulationTactic.AUTHORITY]: 0,
      [ManipulationTactic.GREED]: 0,
      [ManipulationTactic.GUILT]: 0,
    },
    dominantTactic: null,
    recommendedTactic: ResponseTactic.MAINTAIN_ENGAGEMENT,
    messagesAnalyzed: 0,
  };
}

export interface ProfileSignals {
  aggression: number;
  patience: number;
  sophistication: number;
  manipulation: number;
  tactics: Record<ManipulationTactic, number>;
}

/**
 * Reads the scammer's temperament from message text alone.
 *
 * Each message yields raw signals in [0, 1] that are folded into the running
 * profile with exponential smoothing, so one outlier message moves a score
 * by at most PROFILE_ALPHA of the distance.
 */
@Injectable()
export class ProfilerService {
  private readonly logger = new Logger(ProfilerService.name);
  private readonly aggression = compile(lexicon.aggression);
  private readonly impatience = compile(lexicon.impatience);
  private readonly sophistication = compile(lexicon.sophistication);
  private readonly imperativeVerbs = new Set(lexicon.imperativeVerbs.map((v) => v.toLowerCase()));
  private readonly manipulation = MANIPULATION_TACTICS.map((tactic) => ({
    tactic,
    patterns: compile(lexicon.manipulation[tactic]),
  }));

  /**
   * @param priorScammerMessages earlier scammer messages in order, latest excluded
   */
  update(previous: ScammerProfile, priorScammerMessages: string[], latest: string): ScammerProfile {
    const signals = this.measure(latest, priorScammerMessages.slice(-REPETITION_WINDOW));

    const tacticCounts = { ...previous.tacticCounts };
    const tactics = [...previous.tactics];
    for (const tactic of MANIPULATION_TACTICS) {
      const hits = signals.tactics[tactic];
      if (hits > 0) {
        tacticCounts[tactic] += hits;
        if (!tactics.includes(tactic)) tactics.push(tactic);
      }
    }

    const next: ScammerProfile = {
      aggression: smooth(signals.aggression, previous.aggression),
      patience: smooth(signals.patience, previous.patience),
      sophistication: smooth(signals.sophistication, previous.sophistication),
      manipulation: smooth(signals.manipulation, previous.manipulation),
      tactics,
      tacticCounts,
      dominantTactic: this.dominant(tacticCounts),
      recommendedTactic: ResponseTactic.MAINTAIN_ENGAGEMENT,
      messagesAnalyzed: previous.messagesAnalyzed + 1,
    };
    next.recommendedTactic = this.recommend(next);

    this.logger.debug(
      `Profile aggr=${next.aggression.toFixed(2)} pat=${next.patience.toFixed(2)} ` +
        `soph=${next.sophistication.toFixed(2)} manip=${next.manipulation.toFixed(2)} -> ${next.recommendedTactic}`
    );

    return next;
  }

  /**
   * Raw per-message signals before smoothing.
   */
  measure(text: string, recentScammerMessages: string[] = []): ProfileSignals {
    const lowered = text.toLowerCase();
    const tokens = text.split(/\s+/).filter((t) => /[a-z]/i.test(t));
    const capsTokens = tokens.filter((t) => {
      const letters = t.replace(/[^a-z]/gi, '');
      return letters.length >= 3 && letters === letters.toUpperCase();
    }).length;
    const capsRatio = tokens.length > 0 ? capsTokens / tokens.length : 0;
    const exclamations = (text.match(/!/g) ?? []).length;

    const aggression = 0.15 * countHits(this.aggression, lowered) + 0.1 * exclamations + 0.6 * capsRatio;

    const imperativeStarts = text
      .split(/[.!?\n]+/)
      .map((sentence) => words(sentence)[0])
      .filter((first): first is string => first !== undefined && this.imperativeVerbs.has(first)).length;
    const latestWords = new Set(words(text));
    const nearDuplicates = recentScammerMessages.filter(
      (m) => jaccard(latestWords, new Set(words(m))) >= NEAR_DUPLICATE_JACCARD
    ).length;
    const patience =
      1 - (0.15 * countHits(this.impatience, lowered) + 0.1 * imperativeStarts + 0.2 * nearDuplicates);

    const wellFormed =
      /^[A-Z]/.test(text.trim()) && /[.?!]$/.test(text.trim()) && tokens.length >= 6 && capsRatio < 0.3;
    const sophistication =
      0.1 * countHits(this.sophistication, lowered) +
      (REFERENCE_NUMBER.test(text) ? 0.15 : 0) +
      (FORMAL_PHRASE.test(text) ? 0.15 : 0) +
      (wellFormed ? 0.2 : 0);

    const tactics = defaultProfile().tacticCounts;
    let categories = 0;
    for (const { tactic, patterns } of this.manipulation) {
      tactics[tactic] = countHits(patterns, lowered);
      if (tactics[tactic] > 0) categories++;
    }

    return {
      aggression: clamp01(aggression),
      patience: clamp01(patience),
      sophistication: clamp01(sophistication),
      manipulation: clamp01(categories / MANIPULATION_NORMALIZER),
      tactics,
    };
  }

  /**
   * One-line steer for the reply generator, derived from the profile.
   */
  promptHint(profile: ScammerProfile): string {
    const hints: string[] = [];
    switch (profile.recommendedTactic) {
      case ResponseTactic.SHOW_MORE_CONFUSION:
        hints.push('Scammer is impatient: act more confused and keep replies short');
        break;
      case ResponseTactic.MORE_REALISTIC_PERSONA:
        hints.push('Scammer is sophisticated: stay very realistic and natural');
        break;
      case ResponseTactic.STRATEGIC_ALMOST_COMPLIANCE:
        hints.push('Scammer leans on emotion: almost comply and ask for their details');
        break;
      case ResponseTactic.DANGLE_COMPLIANCE:
        hints.push('Scammer is frustrated: show willingness but hit small obstacles');
        break;
      case ResponseTactic.MAINTAIN_ENGAGEMENT:
        hints.push('Keep the scammer engaged naturally');
        break;
    }
    if (profile.dominantTactic) {
      hints.push(`they mostly use ${profile.dominantTactic}`);
    }
    return hints.join('; ');
  }

  /**
   * How the scammer writes, for the reply to mirror. Null until there are two
   * messages to go on.
   */
  styleHint(scammerMessages: string[]): string | null {
    if (scammerMessages.length < 2) {
      return null;
    }

    const totalWords = scammerMessages.reduce(
      (sum, message) => sum + message.split(/\s+/).filter(Boolean).length,
      0
    );
    const length =
      totalWords / scammerMessages.length > LONG_MESSAGE_WORDS
        ? 'they write long messages, longer replies are fine'
        : 'they write short messages, keep replies brief';
    const register = scammerMessages.some((message) => FORMAL_ADDRESS.test(message))
      ? 'they are formal, answer a little formally if the persona allows'
      : 'they are casual, a casual tone is fine';
    return `${length}; ${register}`;
  }

  private recommend(profile: ScammerProfile): ResponseTactic {
    if (profile.patience < 0.4 && profile.aggression > 0.5) {
      return ResponseTactic.SHOW_MORE_CONFUSION;
    }
    if (profile.sophistication > 0.6) {
      return ResponseTactic.MORE_REALISTIC_PERSONA;
    }
    if (profile.manipulation > 0.6) {
      return ResponseTactic.STRATEGIC_ALMOST_COMPLIANCE;
    }
    if (profile.patience < 0.4) {
      return ResponseTactic.DANGLE_COMPLIANCE;
    }
    return ResponseTactic.MAINTAIN_ENGAGEMENT;
  }

  private dominant(counts: Record<ManipulationTactic, number>): ManipulationTactic | null {
    let best: ManipulationTactic | null = null;
    let bestCount = 0;
    for (const tactic of MANIPULATION_TACTICS) {
      if (counts[tactic] > bestCount) {
        best = tactic;
        bestCount = counts[tactic];
      }
    }
    return best;
  }
}
