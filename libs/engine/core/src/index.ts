// Generation
export * from './lib/generation/generation-backend.interface';
export * from './lib/generation/anthropic-generation.backend';

// Turn processing
export * from './lib/detection/keyword-detector';
export * from './lib/output/turn-output.parser';
export * from './lib/prompts/turn-prompt';
export * from './lib/quality/reply-quality';
export * from './lib/strategies/turn-strategy.interface';
export * from './lib/strategies/llm-turn.strategy';
export * from './lib/strategies/fallback-turn.strategy';

// Services
export * from './lib/orchestrator.service';
export * from './lib/honeypot-engine.service';

// Module
export * from './lib/engine.module';
