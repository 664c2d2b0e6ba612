import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ConversationStage, KeyIntelligenceField, PersonaId } from '@decoy-agent/shared/types';
import { getStageConfig } from '../stages/stage-registry';
import templateData from './data/reply-templates.json';

const lines = z.array(z.string().min(1)).min(1);

const stageLines = z.object({
  initial_hook: lines,
  engagement: lines,
  information_probe: lines,
  resistance: lines,
  gradual_compliance: lines,
  intelligence_mining: lines,
  prolongation: lines,
});

const gapLines = z.object({
  upiIds: lines,
  bankAccounts: lines,
  phishingLinks: lines,
  phoneNumbers: lines,
  backup: lines,
});

const intentLines = z.object({
  credentials: lines,
  account: lines,
  payment: lines,
});

const perPersona = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    [PersonaId.ELDERLY_CONFUSED]: schema,
    [PersonaId.BUSY_PROFESSIONAL]: schema,
    [PersonaId.CURIOUS_STUDENT]: schema,
    [PersonaId.TECH_NAIVE_PARENT]: schema,
    [PersonaId.DESPERATE_JOB_SEEKER]: schema,
  });

const templateSchema = z.object({
  neutral: lines,
  stages: perPersona(stageLines),
  gaps: perPersona(gapLines),
  intents: perPersona(intentLines),
  intentKeywords: z.object({
    credentials: lines,
    account: lines,
    payment: lines,
  }),
});

export type ReplyTemplates = z.infer<typeof templateSchema>;
export type GapTemplateKey = KeyIntelligenceField | 'backup';

/** What the scammer is asking for, in the order a message is tested for them. */
export const REPLY_INTENTS = ['credentials', 'account', 'payment'] as const;
export type ReplyIntent = (typeof REPLY_INTENTS)[number];

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Canned replies for the deterministic path, indexed by persona and stage.
 *
 * Lines are chosen by a caller-supplied turn number rather than at random,
 * so consecutive turns vary and a given turn is reproducible.
 */
@Injectable()
export class ReplyTemplateService {
  private readonly templates: ReplyTemplates = templateSchema.parse(templateData);
  private readonly intentPatterns = REPLY_INTENTS.map((intent) => ({
    intent,
    pattern: new RegExp(
      `(?<![a-z0-9])(?:${this.templates.intentKeywords[intent].map(escapeRegExp).join('|')})(?![a-z0-9])`,
      'i'
    ),
  }));

  /** Non-committal reply for senders not yet judged to be scammers. */
  neutral(turn: number): string {
    return this.pick(this.templates.neutral, turn);
  }

  forStage(persona: PersonaId, stage: ConversationStage, turn: number): string {
    const key = getStageConfig(stage).key;
    return this.pick(this.templates.stages[persona][key], turn);
  }

  forGap(persona: PersonaId, gap: GapTemplateKey, turn: number): string {
    return this.pick(this.templates.gaps[persona][gap], turn);
  }

  /**
   * First intent whose keywords appear in the message as whole words, or
   * null when it asks for nothing in particular.
   */
  intentOf(message: string): ReplyIntent | null {
    return this.intentPatterns.find(({ pattern }) => pattern.test(message))?.intent ?? null;
  }

  forIntent(persona: PersonaId, intent: ReplyIntent, turn: number): string {
    return this.pick(this.templates.intents[persona][intent], turn);
  }

  /** Every line in the table, for checks that must hold across all of them. */
  all(): string[] {
    const { neutral, stages, gaps, intents } = this.templates;
    const personaTables = [...Object.values(stages), ...Object.values(gaps), ...Object.values(intents)];
    const personaLines = personaTables.flatMap((table) =>
      Object.values(table).flat()
    );
    return [...neutral, ...personaLines];
  }

  private pick(options: string[], turn: number): string {
    const index = ((Math.floor(turn) % options.length) + options.length) % options.length;
    return options[index];
  }
}
