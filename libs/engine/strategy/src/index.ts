// Stages
export * from './lib/stages/stage-registry';
export * from './lib/stages/intel-gap';
export * from './lib/stages/stage-tracker.service';

// Personas
export * from './lib/personas/persona-registry';
export * from './lib/personas/persona-selector.service';

// Templates
export * from './lib/templates/reply-templates.service';

// Module
export * from './lib/strategy.module';
