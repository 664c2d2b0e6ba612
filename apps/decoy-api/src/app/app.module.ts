import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { ApiModule } from '@decoy-agent/engine/api';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [honeypotConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    ApiModule,
  ],
})
export class AppModule {}
