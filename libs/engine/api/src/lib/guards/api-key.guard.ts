import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request } from 'express';
import { honeypotConfig } from '@decoy-agent/shared/config';

export const API_KEY_HEADER = 'x-api-key';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.header(API_KEY_HEADER);

    if (provided !== this.config.apiKey) {
      this.logger.warn(`Rejected request to ${request.path}: ${provided ? 'wrong' : 'missing'} API key`);
      throw new UnauthorizedException('Invalid API key');
    }
    return true;
  }
}
