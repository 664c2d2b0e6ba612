export * from './lib/dto/honeypot-request.dto';
export * from './lib/guards/api-key.guard';
export * from './lib/pipes/zod-validation.pipe';
export * from './lib/honeypot.controller';
export * from './lib/api.module';
