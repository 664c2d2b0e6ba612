import { ConversationTurn, SCAM_TYPES, SenderRole } from '@decoy-agent/shared/types';

/** Persona text past this length is cut before it goes into the prompt. */
export const MAX_PERSONA_CHARS = 400;
/** How many earlier turns the prompt carries. */
export const HISTORY_TURNS = 3;
const HISTORY_TURN_CHARS = 50;
const CHARS_PER_TOKEN = 4;

export interface TurnPromptInput {
  message: string;
  personaDescription: string;
  history: readonly ConversationTurn[];
  messageNumber: number;
  stageLabel: string;
  tacticHint: string;
}

export const OUTPUT_CONTRACT =
  `{"is_scam":true/false,"confidence":0.0-1.0,"scam_type":"${SCAM_TYPES.join('|')}",` +
  '"intel":{"bank_accounts":[],"upi_ids":[],"phone_numbers":[],"links":[]},' +
  '"response":"victim reply, 1-2 complete sentences"}';

export const SYSTEM_PROMPT =
  'You play a real person texting with a stranger who may be a scammer. ' +
  'You never reveal that you are automated. You answer with one JSON object and nothing else.';

export function formatHistory(history: readonly ConversationTurn[]): string {
  const recent = history.slice(-HISTORY_TURNS);
  if (recent.length === 0) {
    return '[First message]';
  }
  return recent
    .map((turn) => {
      const tag = turn.sender === SenderRole.SCAMMER ? 'S' : 'U';
      return `${tag}: ${turn.text.slice(0, HISTORY_TURN_CHARS)}`;
    })
    .join(' | ');
}

/**
 * One combined instruction: detection, extraction and the in-persona reply
 * all come back from a single call.
 */
export function buildTurnPrompt(input: TurnPromptInput): string {
  return [
    'PERSONA:',
    input.personaDescription.slice(0, MAX_PERSONA_CHARS),
    '',
    `SCAMMER MESSAGE: "${input.message}"`,
    `RECENT HISTORY: ${formatHistory(input.history)}`,
    `MESSAGE NUMBER: ${input.messageNumber}`,
    `STAGE: ${input.stageLabel}`,
    `STAGE TACTIC: ${input.tacticHint}`,
    '',
    'OUTPUT FORMAT - respond with ONLY valid JSON:',
    OUTPUT_CONTRACT,
    '',
    'EXTRACTION RULES:',
    '- UPI IDs: name@handle format',
    '- Phone numbers: 10 digits starting with 6-9',
    '- Bank accounts: 9 to 18 digit numbers that are not phone numbers',
    '- Links: any http/https URL',
    '- Only report values that appear in the scammer message',
    '',
    'RESPONSE RULES:',
    '- Sound like a real person, stay in character',
    '- End every sentence properly',
    '- Keep the scammer talking and ask for THEIR details',
  ].join('\n');
}

/**
 * Rough token cost of a call: prompt characters over four, plus the full
 * output allowance.
 */
export function estimateTokens(prompt: string, maxOutputTokens: number): number {
  return Math.ceil(prompt.length / CHARS_PER_TOKEN) + maxOutputTokens;
}
