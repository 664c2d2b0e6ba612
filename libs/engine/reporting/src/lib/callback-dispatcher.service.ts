import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { honeypotConfig } from '@decoy-agent/shared/config';
import {
  EngagementEvent,
  EngagementTerminatedEvent,
  FinalReport,
} from '@decoy-agent/shared/types';
import { errorMessage } from '@decoy-agent/shared/utils';

const MAX_ATTEMPTS = 2;

/**
 * Posts the final report to the evaluation endpoint when an engagement
 * ends. Failures are logged and never reach the conversation path.
 */
@Injectable()
export class CallbackDispatcherService {
  private readonly logger = new Logger(CallbackDispatcherService.name);
  private readonly client: AxiosInstance;

  constructor(
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {
    this.client = axios.create({
      timeout: config.callback.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  @OnEvent(EngagementEvent.TERMINATED, { async: true })
  async handleTerminated(event: EngagementTerminatedEvent): Promise<void> {
    this.logger.log(`[${event.sessionId}] Engagement ended (${event.reason}), sending report`);
    await this.dispatch(event.report);
  }

  /**
   * Returns true once the endpoint accepted the report.
   */
  async dispatch(report: FinalReport): Promise<boolean> {
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await this.client.post(this.config.callback.url, report);
        this.logger.log(`[${report.sessionId}] Report accepted with status ${response.status}`);
        return true;
      } catch (error) {
        const detail = isAxiosError(error) && error.response
          ? `status ${error.response.status}`
          : errorMessage(error);
        this.logger.error(
          `[${report.sessionId}] Report attempt ${attempt}/${MAX_ATTEMPTS} failed: ${detail}`
        );
      }
    }
    return false;
  }
}
