import { Injectable } from '@nestjs/common';
import {
  ConversationStageLabel,
  FinalReport,
  HoneypotSession,
  ScamTypeLabel,
} from '@decoy-agent/shared/types';
import { cloneIntelligence, intelligenceScore } from '@decoy-agent/engine/extraction';

/**
 * Builds the end-of-engagement report from a session's final state.
 */
@Injectable()
export class ReportBuilderService {
  build(session: HoneypotSession): FinalReport {
    const intelligence = cloneIntelligence(session.intelligence);

    return {
      sessionId: session.sessionId,
      scamDetected: session.scamDetected,
      totalMessagesExchanged: session.history.length,
      extractedIntelligence: {
        bankAccounts: intelligence.bankAccounts,
        upiIds: intelligence.upiIds,
        phishingLinks: intelligence.phishingLinks,
        phoneNumbers: intelligence.phoneNumbers,
        suspiciousKeywords: intelligence.suspiciousKeywords,
      },
      agentNotes: this.buildNotes(session),
    };
  }

  private buildNotes(session: HoneypotSession): string {
    const { profile, metrics } = session;
    const notes = [
      `Scam type: ${session.scamType ? ScamTypeLabel[session.scamType] : 'not determined'}`,
      `Persona: ${session.persona ?? 'none'}`,
      `Confidence: ${session.detectionConfidence.toFixed(2)}`,
      `Intel score: ${intelligenceScore(session.intelligence)}`,
      `Final stage: ${ConversationStageLabel[session.stage]}`,
      `Tactics observed: ${profile.tactics.length > 0 ? profile.tactics.join(', ') : 'none'}`,
      `Turns: ${metrics.llmTurns} generated, ${metrics.fallbackTurns} fallback`,
    ];
    return notes.join('. ') + '.';
  }
}
