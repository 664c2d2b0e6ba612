import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { HoneypotConfig, honeypotConfig } from '@decoy-agent/shared/config';
import { ConfigurationError } from '@decoy-agent/shared/utils';
import { AppModule } from './app/app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
    abortOnError: false,
  });

  app.enableShutdownHooks();

  const config = app.get<HoneypotConfig>(honeypotConfig.KEY);
  // Use :: to bind to both IPv4 and IPv6
  const host = '::';

  await app.listen(config.port, host);

  Logger.log(`Decoy API running on ${host}:${config.port}`, 'Bootstrap');
  Logger.log(
    `Model ${config.llm.model}, limits ${config.rateLimit.requestsPerMinute} req/min and ` +
      `${config.rateLimit.tokensPerMinute} tokens/min`,
    'Bootstrap'
  );
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    for (const issue of error.issues) {
      Logger.error(`Configuration: ${issue}`, 'Bootstrap');
    }
  } else {
    Logger.error(
      error instanceof Error ? (error.stack ?? error.message) : String(error),
      'Bootstrap'
    );
  }
  process.exit(1);
});
