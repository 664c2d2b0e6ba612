import { ScamType } from '@decoy-agent/shared/types';
import { parseTurnOutput, repairJsonText } from './turn-output.parser';

describe('parseTurnOutput', () => {
  const valid = {
    is_scam: true,
    confidence: 0.9,
    scam_type: 'upi_fraud',
    intel: {
      bank_accounts: [],
      upi_ids: ['refund.desk@ybl'],
      phone_numbers: ['9876543210'],
      links: [],
    },
    response: 'Which UPI app should I use for this?',
  };

  it('should accept output that matches the contract', () => {
    const result = parseTurnOutput(JSON.stringify(valid));

    expect(result).toEqual({
      ok: true,
      repaired: false,
      output: {
        isScam: true,
        confidence: 0.9,
        scamType: ScamType.UPI_FRAUD,
        intel: {
          bankAccounts: [],
          upiIds: ['refund.desk@ybl'],
          phoneNumbers: ['9876543210'],
          phishingLinks: [],
        },
        reply: 'Which UPI app should I use for this?',
      },
    });
  });

  it('should default missing intel lists', () => {
    const result = parseTurnOutput(
      '{"is_scam":false,"confidence":0.1,"scam_type":"other","response":"Who is this?"}'
    );

    expect(result.ok && result.output.intel).toEqual({
      bankAccounts: [],
      upiIds: [],
      phoneNumbers: [],
      phishingLinks: [],
    });
  });

  it('should repair fenced output with trailing commas', () => {
    const raw = '```json\n{"is_scam":true,"confidence":0.8,"scam_type":"phishing","response":"What link?",}\n```';

    const result = parseTurnOutput(raw);

    expect(result.ok).toBe(true);
    expect(result.ok && result.repaired).toBe(true);
    expect(result.ok && result.output.scamType).toBe(ScamType.PHISHING);
  });

  it('should slice the object out of surrounding prose', () => {
    const raw = `Here is my answer: ${JSON.stringify(valid)} Hope that helps.`;

    const result = parseTurnOutput(raw);

    expect(result.ok && result.output.reply).toBe('Which UPI app should I use for this?');
  });

  it('should coerce loosely typed fields during repair', () => {
    const raw = JSON.stringify({
      is_scam: 'true',
      confidence: '0.75',
      scam_type: 'Lottery',
      intel: { bank_accounts: [123456789012], phishing_links: 'http://prize.example/claim' },
      response: 'Really? What do I need to do?',
    });

    const result = parseTurnOutput(raw);

    expect(result).toEqual({
      ok: true,
      repaired: true,
      output: {
        isScam: true,
        confidence: 0.75,
        scamType: ScamType.LOTTERY,
        intel: {
          bankAccounts: ['123456789012'],
          upiIds: [],
          phoneNumbers: [],
          phishingLinks: ['http://prize.example/claim'],
        },
        reply: 'Really? What do I need to do?',
      },
    });
  });

  it('should map an unknown scam type to other', () => {
    const result = parseTurnOutput(JSON.stringify({ ...valid, scam_type: 'romance' }));

    expect(result.ok && result.output.scamType).toBe(ScamType.OTHER);
  });

  it('should reject out-of-range confidence', () => {
    const result = parseTurnOutput(JSON.stringify({ ...valid, confidence: 1.5 }));

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toContain('confidence');
  });

  it('should reject an empty reply', () => {
    const result = parseTurnOutput(JSON.stringify({ ...valid, response: '   ' }));

    expect(result.ok).toBe(false);
  });

  it('should reject text that is not JSON', () => {
    const result = parseTurnOutput('Sorry, I cannot help with that.');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith('not JSON')).toBe(true);
  });
});

describe('repairJsonText', () => {
  it('should strip fences and trailing commas', () => {
    expect(repairJsonText('```\n{"a":[1,2,],}\n```')).toBe('{"a":[1,2]}');
  });
});
