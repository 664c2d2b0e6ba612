export * from './lib/report-builder.service';
export * from './lib/callback-dispatcher.service';
export * from './lib/reporting.module';
