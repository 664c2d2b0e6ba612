import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { INTELLIGENCE_FIELDS, Intelligence, IntelligenceField } from '@decoy-agent/shared/types';
import { emptyIntelligence } from './intelligence';
import vocabularyData from './data/extraction-vocabulary.json';

const vocabularySchema = z.object({
  paymentHandles: z.array(z.string().min(1)).min(1),
  suspiciousKeywords: z.array(z.string().min(1)).min(1),
});

const vocabulary = vocabularySchema.parse(vocabularyData);

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const URL_TRAILING = /[.,;:!?)\]}'"]+$/;
const PAYMENT_ID_PATTERN = /([a-z0-9][a-z0-9._-]{1,255})@([a-z][a-z0-9]{1,63})(?![a-z0-9]|\.[a-z0-9])/gi;
const AT_TOKEN_PATTERN = /[a-z0-9._-]+@[a-z0-9.-]+/gi;
const PHONE_PATTERN = /(?<![\d+])(?:\+91[\s-]?|91[\s-]?|0)?([6-9]\d{4})[\s-]?(\d{5})(?!\d)/g;
const DIGIT_RUN_PATTERN = /(?<!\d)\d{9,18}(?!\d)/g;
const PHONE_VALID = /^(?:\+?91|0)?[6-9]\d{9}$/;
// Digits grouped by single spaces or hyphens, as account numbers are often written.
const GROUPED_DIGITS_PATTERN = /\d(?:[\s-]?\d)*/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * True when the value reads as an Indian mobile number, with or without a
 * country or trunk prefix. Such values never count as bank accounts.
 */
export function isPhoneLike(value: string): boolean {
  return PHONE_VALID.test(value.replace(/[\s-]/g, ''));
}

/**
 * Deterministic recognizers for identifying details in scammer messages.
 *
 * Recognizers run in a fixed order and mask what earlier ones consumed:
 * links first, then payment IDs, then phone numbers and bank accounts on
 * the remaining text. Nothing here throws; malformed fragments are skipped.
 */
@Injectable()
export class ExtractorService {
  private readonly logger = new Logger(ExtractorService.name);
  private readonly paymentHandles = new Set(vocabulary.paymentHandles.map((h) => h.toLowerCase()));
  private readonly keywordPatterns = vocabulary.suspiciousKeywords.map((keyword) => ({
    keyword: keyword.toLowerCase(),
    pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
  }));

  extract(text: string): Intelligence {
    const intel = emptyIntelligence();
    if (!text || !text.trim()) {
      return intel;
    }

    intel.phishingLinks = this.findLinks(text);
    const withoutLinks = text.replace(URL_PATTERN, ' ');

    intel.upiIds = this.findPaymentIds(withoutLinks);
    const withoutHandles = withoutLinks.replace(AT_TOKEN_PATTERN, ' ');

    intel.phoneNumbers = this.findPhones(withoutHandles);
    intel.bankAccounts = this.findBankAccounts(withoutHandles);
    intel.suspiciousKeywords = this.findKeywords(text);

    return intel;
  }

  /**
   * Combine model-reported values with the recognizers' own findings.
   *
   * Model values are re-run through the recognizer for their field and kept
   * only in normalized form. When `sourceText` is given each value must also
   * be one the field's recognizer finds in that text, so a number cut out of
   * a longer digit run is dropped along with invented ones. Bank accounts may
   * also match a whole space- or hyphen-grouped number. Values the
   * recognizers found and the model missed are always added.
   */
  reconcile(
    llmExtracted: Partial<Intelligence>,
    regexExtracted: Intelligence,
    sourceText?: string
  ): Intelligence {
    const inSource = sourceText === undefined ? null : this.extract(sourceText);
    const groupedNumbers =
      sourceText === undefined
        ? []
        : [...sourceText.matchAll(GROUPED_DIGITS_PATTERN)].map((m) => m[0].replace(/[\s-]/g, ''));
    const result = emptyIntelligence();

    for (const field of INTELLIGENCE_FIELDS) {
      const accepted: string[] = [];
      for (const raw of llmExtracted[field] ?? []) {
        const validated = this.validate(field, raw);
        if (validated.length === 0) {
          this.logger.debug(`Dropped ${field} value that failed validation: ${raw}`);
          continue;
        }
        for (const value of validated) {
          const found =
            inSource === null ||
            inSource[field].includes(value) ||
            (field === 'bankAccounts' && groupedNumbers.includes(value));
          if (!found) {
            this.logger.debug(`Dropped ${field} value not present in the message: ${value}`);
            continue;
          }
          accepted.push(value);
        }
      }
      result[field] = unique([...accepted, ...regexExtracted[field]]);
    }

    return result;
  }

  /**
   * Run one field's recognizer over a single candidate value.
   */
  validate(field: IntelligenceField, raw: string): string[] {
    const value = raw.trim();
    if (!value) return [];

    switch (field) {
      case 'bankAccounts': {
        const digits = value.replace(/[\s-]/g, '');
        return /^\d{9,18}$/.test(digits) && !isPhoneLike(digits) ? [digits] : [];
      }
      case 'phoneNumbers':
        return this.findPhones(value);
      case 'upiIds':
        return this.findPaymentIds(value);
      case 'phishingLinks':
        return this.findLinks(value);
      case 'suspiciousKeywords': {
        const lowered = value.toLowerCase();
        return this.keywordPatterns.some((k) => k.keyword === lowered) ? [lowered] : [];
      }
    }
  }

  isPaymentHandle(provider: string): boolean {
    return this.paymentHandles.has(provider.toLowerCase());
  }

  private findLinks(text: string): string[] {
    const links: string[] = [];
    for (const match of text.matchAll(URL_PATTERN)) {
      const link = match[0].replace(URL_TRAILING, '');
      if (/^https?:\/\/[^/\s]+\.[^/\s]+/i.test(link)) {
        links.push(link);
      }
    }
    return unique(links);
  }

  private findPaymentIds(text: string): string[] {
    const ids: string[] = [];
    for (const match of text.matchAll(PAYMENT_ID_PATTERN)) {
      const [, local, provider] = match;
      if (this.isPaymentHandle(provider)) {
        ids.push(`${local}@${provider.toLowerCase()}`);
      }
    }
    return unique(ids);
  }

  private findPhones(text: string): string[] {
    const phones: string[] = [];
    for (const match of text.matchAll(PHONE_PATTERN)) {
      phones.push(`${match[1]}${match[2]}`);
    }
    return unique(phones);
  }

  private findBankAccounts(text: string): string[] {
    const accounts: string[] = [];
    for (const match of text.matchAll(DIGIT_RUN_PATTERN)) {
      if (!isPhoneLike(match[0])) {
        accounts.push(match[0]);
      }
    }
    return unique(accounts);
  }

  private findKeywords(text: string): string[] {
    return this.keywordPatterns.filter((k) => k.pattern.test(text)).map((k) => k.keyword);
  }
}
