import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { ConversationStateService } from '../conversation-state.service';
import { PendingAuthRegistry } from '../pending-auth.registry';

/**
 * Drops login flows nobody touched for `login.flowTtlSeconds`.
 */
@Injectable()
export class LoginFlowSweeperService {
  private readonly logger = new Logger(LoginFlowSweeperService.name);

  constructor(
    private conversationState: ConversationStateService,
    private registry: PendingAuthRegistry,
    private configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE, { name: 'login-flow-sweep' })
  async handleSweep(): Promise<void> {
    try {
      await this.sweepStaleFlows();
    } catch (error) {
      this.logger.error(
        'Login flow sweep failed',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * @returns Number of pending logins and conversation states dropped
   */
  async sweepStaleFlows(now: Date = new Date()): Promise<{ pending: number; states: number }> {
    const ttlSeconds = this.configService.get<number>('login.flowTtlSeconds', 600);
    const cutoff = new Date(now.getTime() - ttlSeconds * 1000);

    const expiredPending = await this.registry.expireOlderThan(cutoff);
    const expiredStates = this.conversationState.expireOlderThan(cutoff);

    if (expiredPending.length > 0 || expiredStates.length > 0) {
      this.logger.log(
        `Expired ${expiredPending.length} pending logins and ${expiredStates.length} conversation states`,
      );
    }

    return { pending: expiredPending.length, states: expiredStates.length };
  }
}
