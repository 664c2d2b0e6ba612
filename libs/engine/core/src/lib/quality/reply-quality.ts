import { ConversationTurn, SenderRole } from '@decoy-agent/shared/types';

export const MIN_REPLY_WORDS = 2;
export const MAX_REPLY_CHARS = 300;
/** Replies shorter than this may not repeat any word three times. */
const REPETITION_WORD_LIMIT = 15;
const MAX_WORD_REPEATS = 2;
/** A reply sharing more than this fraction of its word set with a recent one is a rerun. */
export const SIMILARITY_THRESHOLD = 0.7;
export const SIMILARITY_WINDOW = 3;

/** Phrases that give away an automated responder. Matched case-insensitively. */
export const AI_DISCLOSURE_PHRASES: readonly string[] = [
  'as an ai',
  "i'm an ai",
  'i am an ai',
  'ai assistant',
  'language model',
  'i apologize',
  "i can't assist",
  'i cannot assist',
  'i am not able to help with',
  'honeypot',
  'scam detection',
  'automated system',
];

export type ReplyRejection =
  | 'empty'
  | 'too_short'
  | 'too_long'
  | 'unterminated'
  | 'ai_disclosure'
  | 'repetitive'
  | 'too_similar';

export type ReplyCheck = { ok: true } | { ok: false; rejection: ReplyRejection; detail?: string };

const LABEL_PREFIX = /^(?:response|reply|victim|answer)\s*:\s*/i;
const WRAPPING_QUOTES = /^["'“”‘’`]+|["'“”‘’`]+$/g;
const TERMINAL = /[.!?]$/;
// A reply cut off after one of these words is not finished; punctuation would hide that.
const DANGLING_ENDING =
  /\s(?:i|can|what|why|how|when|where|who|will|should|could|would|please|my|your|the|is|are|was|were|be|been|has|have|had|do|does|did|to|and|or|but|a|an)$/i;
const QUESTION_OPENING = /^(?:what|why|how|when|where|who|which|can you|could you|should i|is it|are you|do i)\b/i;

/**
 * Normalize a generated reply: trim, drop a leading "Reply:" style label and
 * wrapping quotes, collapse whitespace, and add terminal punctuation when the
 * text reads as a finished sentence.
 */
export function polishReply(raw: string): string {
  let text = raw.trim().replace(WRAPPING_QUOTES, '').trim();
  text = text.replace(LABEL_PREFIX, '').replace(WRAPPING_QUOTES, '').replace(/\s+/g, ' ').trim();

  if (!text || TERMINAL.test(text) || DANGLING_ENDING.test(text)) {
    return text;
  }

  return QUESTION_OPENING.test(text) ? `${text}?` : `${text}.`;
}

function wordKey(word: string): string {
  return word.toLowerCase().replace(/[^a-z0-9']/g, '');
}

function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).map(wordKey).filter(Boolean));
}

/** Jaccard index of the two replies' word sets. */
export function replySimilarity(a: string, b: string): number {
  const left = wordSet(a);
  const right = wordSet(b);
  if (left.size === 0 || right.size === 0) return 0;
  let shared = 0;
  for (const word of left) {
    if (right.has(word)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/** Our own last few replies, oldest first. */
export function recentReplies(history: readonly ConversationTurn[]): string[] {
  return history
    .filter((turn) => turn.sender === SenderRole.USER)
    .slice(-SIMILARITY_WINDOW)
    .map((turn) => turn.text);
}

/**
 * @param recent replies already sent in this session; only the last few are compared
 */
export function checkReply(text: string, recent: readonly string[] = []): ReplyCheck {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return { ok: false, rejection: 'empty' };
  }
  if (words.length < MIN_REPLY_WORDS) {
    return { ok: false, rejection: 'too_short' };
  }
  if (text.length > MAX_REPLY_CHARS) {
    return { ok: false, rejection: 'too_long', detail: `${text.length} chars` };
  }
  if (!TERMINAL.test(text)) {
    return { ok: false, rejection: 'unterminated' };
  }

  const lowered = text.toLowerCase();
  const phrase = AI_DISCLOSURE_PHRASES.find((p) => lowered.includes(p));
  if (phrase) {
    return { ok: false, rejection: 'ai_disclosure', detail: phrase };
  }

  if (words.length < REPETITION_WORD_LIMIT) {
    const counts = new Map<string, number>();
    for (const word of words) {
      const key = wordKey(word);
      if (!key) continue;
      const count = (counts.get(key) ?? 0) + 1;
      if (count > MAX_WORD_REPEATS) {
        return { ok: false, rejection: 'repetitive', detail: key };
      }
      counts.set(key, count);
    }
  }

  const rerun = recent
    .slice(-SIMILARITY_WINDOW)
    .find((previous) => replySimilarity(text, previous) > SIMILARITY_THRESHOLD);
  if (rerun !== undefined) {
    return { ok: false, rejection: 'too_similar', detail: rerun };
  }

  return { ok: true };
}

