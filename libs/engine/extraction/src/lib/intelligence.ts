import {
  INTELLIGENCE_FIELDS,
  Intelligence,
  KEY_INTELLIGENCE_FIELDS,
  KeyIntelligenceField,
} from '@decoy-agent/shared/types';

interface CategoryWeight {
  perItem: number;
  cap: number;
}

/**
 * Score contribution per key category. Caps stop a pile of near-duplicate
 * values in one category from ending an engagement on its own.
 */
export const INTELLIGENCE_WEIGHTS: Record<KeyIntelligenceField, CategoryWeight> = {
  bankAccounts: { perItem: 3, cap: 6 },
  upiIds: { perItem: 3, cap: 6 },
  phoneNumbers: { perItem: 1, cap: 2 },
  phishingLinks: { perItem: 2, cap: 4 },
};

/** Order in which missing categories are asked for. */
export const INTEL_PRIORITY: readonly KeyIntelligenceField[] = [
  'upiIds',
  'bankAccounts',
  'phishingLinks',
  'phoneNumbers',
];

export function emptyIntelligence(): Intelligence {
  return {
    bankAccounts: [],
    upiIds: [],
    phoneNumbers: [],
    phishingLinks: [],
    suspiciousKeywords: [],
  };
}

export function cloneIntelligence(intel: Intelligence): Intelligence {
  return {
    bankAccounts: [...intel.bankAccounts],
    upiIds: [...intel.upiIds],
    phoneNumbers: [...intel.phoneNumbers],
    phishingLinks: [...intel.phishingLinks],
    suspiciousKeywords: [...intel.suspiciousKeywords],
  };
}

/**
 * Union `delta` into `target` in place. Returns how many values were new,
 * so applying the same delta twice adds nothing the second time.
 */
export function mergeIntelligence(target: Intelligence, delta: Partial<Intelligence>): number {
  let added = 0;
  for (const field of INTELLIGENCE_FIELDS) {
    const incoming = delta[field];
    if (!incoming) continue;
    const existing = new Set(target[field]);
    for (const value of incoming) {
      if (!existing.has(value)) {
        existing.add(value);
        target[field].push(value);
        added++;
      }
    }
  }
  return added;
}

export function intelligenceScore(intel: Intelligence): number {
  return KEY_INTELLIGENCE_FIELDS.reduce((score, field) => {
    const { perItem, cap } = INTELLIGENCE_WEIGHTS[field];
    return score + Math.min(intel[field].length * perItem, cap);
  }, 0);
}

/**
 * Share of key categories holding at least one value, in [0, 1].
 */
export function intelligenceCompleteness(intel: Intelligence): number {
  const filled = KEY_INTELLIGENCE_FIELDS.filter((field) => intel[field].length > 0).length;
  return filled / KEY_INTELLIGENCE_FIELDS.length;
}

export function missingCategories(intel: Intelligence): KeyIntelligenceField[] {
  return INTEL_PRIORITY.filter((field) => intel[field].length === 0);
}
