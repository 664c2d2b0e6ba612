import {
  cloneIntelligence,
  emptyIntelligence,
  intelligenceCompleteness,
  intelligenceScore,
  mergeIntelligence,
  missingCategories,
} from './intelligence';

describe('intelligence helpers', () => {
  describe('intelligenceScore', () => {
    it('should weight each key category', () => {
      const intel = emptyIntelligence();
      mergeIntelligence(intel, {
        bankAccounts: ['123456789012'],
        upiIds: ['a1@ybl'],
        phoneNumbers: ['9876543210'],
        phishingLinks: ['http://x.example.com'],
      });

      expect(intelligenceScore(intel)).toBe(3 + 3 + 1 + 2);
    });

    it('should cap repeated values within a category', () => {
      const intel = emptyIntelligence();
      mergeIntelligence(intel, {
        upiIds: ['a1@ybl', 'a2@ybl', 'a3@ybl', 'a4@ybl'],
        phoneNumbers: ['9876543210', '9876543211', '9876543212'],
      });

      expect(intelligenceScore(intel)).toBe(6 + 2);
    });

    it('should ignore keywords', () => {
      const intel = emptyIntelligence();
      mergeIntelligence(intel, { suspiciousKeywords: ['otp', 'urgent', 'kyc'] });

      expect(intelligenceScore(intel)).toBe(0);
    });
  });

  it('should measure completeness over the four key categories', () => {
    const intel = emptyIntelligence();
    expect(intelligenceCompleteness(intel)).toBe(0);

    mergeIntelligence(intel, { upiIds: ['a1@ybl'], phoneNumbers: ['9876543210'] });

    expect(intelligenceCompleteness(intel)).toBe(0.5);
    expect(missingCategories(intel)).toEqual(['bankAccounts', 'phishingLinks']);
  });

  it('should list missing categories in asking order', () => {
    expect(missingCategories(emptyIntelligence())).toEqual([
      'upiIds',
      'bankAccounts',
      'phishingLinks',
      'phoneNumbers',
    ]);
  });

  it('should merge union-only and report the number of new values', () => {
    const intel = emptyIntelligence();
    mergeIntelligence(intel, { phoneNumbers: ['9876543210'] });

    const added = mergeIntelligence(intel, { phoneNumbers: ['9876543210', '9123456789'] });

    expect(added).toBe(1);
    expect(intel.phoneNumbers).toEqual(['9876543210', '9123456789']);
  });

  it('should clone without sharing arrays', () => {
    const intel = emptyIntelligence();
    const copy = cloneIntelligence(intel);
    copy.upiIds.push('a1@ybl');

    expect(intel.upiIds).toEqual([]);
  });
});
