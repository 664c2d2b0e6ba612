/**
 * Evidence extracted from a scammer's messages. Every field is a deduplicated,
 * append-only list of normalized values.
 */
export interface Intelligence {
  bankAccounts: string[];
  upiIds: string[];
  phoneNumbers: string[];
  phishingLinks: string[];
  suspiciousKeywords: string[];
}

export type IntelligenceField = keyof Intelligence;

export const INTELLIGENCE_FIELDS: readonly IntelligenceField[] = [
  'bankAccounts',
  'upiIds',
  'phoneNumbers',
  'phishingLinks',
  'suspiciousKeywords',
];

/**
 * The four categories that count toward completeness and scoring.
 * Keywords are context, not identifying evidence.
 */
export type KeyIntelligenceField = Exclude<IntelligenceField, 'suspiciousKeywords'>;

export const KEY_INTELLIGENCE_FIELDS: readonly KeyIntelligenceField[] = [
  'bankAccounts',
  'upiIds',
  'phoneNumbers',
  'phishingLinks',
];
