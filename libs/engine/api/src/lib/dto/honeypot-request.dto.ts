/**
 * Honeypot API DTOs
 *
 * The transport posts one scammer message per call, optionally with the
 * turns it already exchanged and channel metadata.
 */

import { z } from 'zod';
import { SenderRole } from '@decoy-agent/shared/types';

const sender = z
  .string()
  .trim()
  .min(1)
  .transform((value) =>
    value.toLowerCase() === SenderRole.SCAMMER ? SenderRole.SCAMMER : SenderRole.USER
  );

/** Epoch milliseconds, a numeric string, or an ISO-8601 date. */
const timestamp = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const millis =
    typeof value === 'number'
      ? value
      : /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : Date.parse(value);
  if (!Number.isFinite(millis)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
    return z.NEVER;
  }
  return millis;
});

const messageSchema = z.object({
  sender,
  text: z.string().trim().min(1, 'text is required').max(5000),
  timestamp: timestamp.optional(),
});

export const honeypotRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required').max(200),
  message: messageSchema,
  conversationHistory: z.array(messageSchema).max(200).optional(),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional(),
    })
    .optional(),
});

export type HoneypotRequestDto = z.infer<typeof honeypotRequestSchema>;

export interface HoneypotResponseDto {
  status: 'success';
  reply: string;
}
