export * from './lib/extractor.service';
export * from './lib/intelligence';
export * from './lib/extraction.module';
