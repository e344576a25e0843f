import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram } from 'prom-client';

export type CodeRequestStatus = 'sent' | 'already_authorized' | 'rate_limited' | 'failed';
export type SignInResult = 'success' | 'two_factor_required' | 'retryable' | 'failed';

/**
 * Prometheus metrics for the login bot.
 * Tracks code requests, sign-in outcomes, open flows and update processing.
 */
@Injectable()
export class MetricsService {
  // Login Metrics
  private readonly codeRequestCounter: Counter;
  private readonly signInCounter: Counter;
  private readonly signInDuration: Histogram;
  private readonly pendingFlowsGauge: Gauge;
  private readonly expiredFlowsCounter: Counter;

  // Bot Metrics
  private readonly updatesProcessedCounter: Counter;
  private readonly updateFailuresCounter: Counter;

  constructor() {
    this.codeRequestCounter = new Counter({
      name: 'login_code_requests_total',
      help: 'Total number of login code requests',
      labelNames: ['status'],
    });

    this.signInCounter = new Counter({
      name: 'login_sign_in_total',
      help: 'Total number of sign-in attempts by outcome',
      labelNames: ['step', 'result'],
    });

    this.signInDuration = new Histogram({
      name: 'login_sign_in_duration_seconds',
      help: 'Duration of sign-in calls against the account provider',
      buckets: [0.1, 0.5, 1, 2, 5, 10],
    });

    this.pendingFlowsGauge = new Gauge({
      name: 'login_pending_flows',
      help: 'Current number of in-flight logins',
    });

    this.expiredFlowsCounter = new Counter({
      name: 'login_expired_flows_total',
      help: 'Total number of pending logins dropped by the sweeper',
    });

    this.updatesProcessedCounter = new Counter({
      name: 'bot_updates_processed_total',
      help: 'Total number of bot updates handled',
      labelNames: ['type'],
    });

    this.updateFailuresCounter = new Counter({
      name: 'bot_update_failures_total',
      help: 'Total number of bot updates whose handling threw',
    });
  }

  incrementCodeRequest(status: CodeRequestStatus): void {
    this.codeRequestCounter.inc({ status });
  }

  incrementSignIn(step: 'code' | 'password', result: SignInResult): void {
    this.signInCounter.inc({ step, result });
  }

  recordSignInDuration(durationSeconds: number): void {
    this.signInDuration.observe(durationSeconds);
  }

  setPendingFlows(count: number): void {
    this.pendingFlowsGauge.set(count);
  }

  incrementExpiredFlows(count: number): void {
    this.expiredFlowsCounter.inc(count);
  }

  incrementUpdateProcessed(type: 'message' | 'callback_query' | 'ignored'): void {
    this.updatesProcessedCounter.inc({ type });
  }

  incrementUpdateFailure(): void {
    this.updateFailuresCounter.inc();
  }
}
