import { ScamType } from '@decoy-agent/shared/types';
import { detectByKeywords, matchIndicators, quickScamType } from './keyword-detector';

describe('keyword detector', () => {
  const blockedAccount =
    'Your account will be blocked today! Verify immediately. Call +91 9876543210 or send ₹1 to 9876543210@paytm';

  describe('detectByKeywords', () => {
    it('should flag a message with enough indicators', () => {
      const result = detectByKeywords(blockedAccount);

      expect(result.indicators).toEqual(['blocked', 'verify', 'account']);
      expect(result.isScam).toBe(true);
      expect(result.confidence).toBeCloseTo(0.8, 6);
      expect(result.scamType).toBe(ScamType.BANK_FRAUD);
    });

    it('should not flag small talk', () => {
      expect(detectByKeywords('Hi, is this Ravi?')).toEqual({
        isScam: false,
        confidence: 0,
        scamType: ScamType.OTHER,
        indicators: [],
      });
    });

    it('should not flag a single indicator', () => {
      const result = detectByKeywords('Can you check my account later?');

      expect(result.isScam).toBe(false);
      expect(result.confidence).toBeCloseTo(0.6, 6);
    });

    it('should cap confidence at 0.9', () => {
      const result = detectByKeywords('URGENT: your bank account is blocked, verify KYC with OTP');

      expect(result.indicators).toHaveLength(7);
      expect(result.confidence).toBe(0.9);
    });
  });

  describe('quickScamType', () => {
    it('should check categories in order', () => {
      expect(quickScamType('Congratulations winner! Claim your lottery prize')).toBe(ScamType.LOTTERY);
      expect(quickScamType('Pay the fee to helpdesk@ybl')).toBe(ScamType.UPI_FRAUD);
      expect(quickScamType('Click http://short.example/x')).toBe(ScamType.PHISHING);
      expect(quickScamType('You are selected for a work from home job')).toBe(ScamType.JOB_SCAM);
      expect(quickScamType('Your computer has a virus')).toBe(ScamType.TECH_SUPPORT);
      expect(quickScamType('Your KYC expired, send the pay link')).toBe(ScamType.BANK_FRAUD);
    });
  });

  it('should match indicators inside longer words', () => {
    expect(matchIndicators('Payments are suspended urgently')).toEqual(['urgent', 'suspended', 'payment']);
  });
});
