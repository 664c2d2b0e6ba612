import { z } from 'zod';
import { Intelligence, ScamType, isScamType } from '@decoy-agent/shared/types';

/**
 * Reply contract for one generation call, after validation.
 */
export interface TurnOutput {
  isScam: boolean;
  confidence: number;
  scamType: ScamType;
  intel: Pick<Intelligence, 'bankAccounts' | 'upiIds' | 'phoneNumbers' | 'phishingLinks'>;
  reply: string;
}

export type TurnOutputParseResult =
  | { ok: true; output: TurnOutput; repaired: boolean }
  | { ok: false; error: string };

const strictList = z.array(z.string()).default([]);

const strictSchema = z.object({
  is_scam: z.boolean(),
  confidence: z.number().min(0).max(1),
  scam_type: z.nativeEnum(ScamType),
  intel: z
    .object({
      bank_accounts: strictList,
      upi_ids: strictList,
      phone_numbers: strictList,
      links: strictList,
    })
    .default({}),
  response: z.string().trim().min(1),
});

type RawTurnOutput = z.infer<typeof strictSchema>;

const looseBoolean = z.preprocess((value) => {
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === 'yes') return true;
    if (lowered === 'false' || lowered === 'no') return false;
  }
  return value;
}, z.boolean());

const looseConfidence = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().min(0).max(1)
);

const looseScamType = z.preprocess((value) => {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return isScamType(normalized) ? normalized : ScamType.OTHER;
}, z.nativeEnum(ScamType));

const looseList = z.preprocess((value) => {
  if (value === null || value === undefined) return [];
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item) => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item));
}, z.array(z.string()));

const looseIntel = z.preprocess(
  (value) => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
    const record: Record<string, unknown> = { ...value };
    if (record['links'] === undefined && record['phishing_links'] !== undefined) {
      record['links'] = record['phishing_links'];
    }
    return record;
  },
  z.object({
    bank_accounts: looseList,
    upi_ids: looseList,
    phone_numbers: looseList,
    links: looseList,
  })
);

const looseSchema = z.object({
  is_scam: looseBoolean,
  confidence: looseConfidence,
  scam_type: looseScamType,
  intel: looseIntel,
  response: z.string().trim().min(1),
});

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

/**
 * Text-level repair: drop code fences, keep the outermost object and remove
 * trailing commas before a closing bracket.
 */
export function repairJsonText(raw: string): string {
  let text = raw.trim().replace(/^```[a-z]*\s*/i, '').replace(/\s*```$/, '');
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    text = text.slice(start, end + 1);
  }
  return text.replace(/,\s*([}\]])/g, '$1');
}

function toTurnOutput(raw: RawTurnOutput): TurnOutput {
  return {
    isScam: raw.is_scam,
    confidence: raw.confidence,
    scamType: raw.scam_type,
    intel: {
      bankAccounts: raw.intel.bank_accounts,
      upiIds: raw.intel.upi_ids,
      phoneNumbers: raw.intel.phone_numbers,
      phishingLinks: raw.intel.links,
    },
    reply: raw.response,
  };
}

/**
 * Validate generated text against the turn contract. Output that fails the
 * strict schema gets one repair pass (text cleanup plus field coercion);
 * anything still invalid is a tagged failure.
 */
export function parseTurnOutput(raw: string): TurnOutputParseResult {
  const direct = parseJson(raw.trim());
  if (direct.ok) {
    const strict = strictSchema.safeParse(direct.value);
    if (strict.success) {
      return { ok: true, output: toTurnOutput(strict.data), repaired: false };
    }
  }

  const repairedJson = parseJson(repairJsonText(raw));
  if (!repairedJson.ok) {
    return { ok: false, error: `not JSON: ${repairedJson.error}` };
  }

  const loose = looseSchema.safeParse(repairedJson.value);
  if (!loose.success) {
    return { ok: false, error: describeIssues(loose.error) };
  }
  return { ok: true, output: toTurnOutput(loose.data), repaired: true };
}
