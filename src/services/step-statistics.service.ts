import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import { StepStatistics, TroubleshootingStep } from '../interfaces';
import { LexiconRegistryService } from './lexicon-registry.service';

export class UnknownStepError extends Error {
  constructor(readonly stepId: string) {
    super(`Unknown troubleshooting step: ${stepId}`);
    this.name = 'UnknownStepError';
  }
}

/**
 * Success and attempt counters for troubleshooting steps.
 *
 * This is the single mutation point for step statistics. Updates run
 * synchronously on the event loop, so concurrent calls cannot lose an
 * increment.
 *
 * Counters grow by one per recorded outcome. The success rate is an
 * exponential moving average seeded from the knowledge-base ratio:
 * rate += alpha * (outcome - rate).
 */
@Injectable()
export class StepStatisticsService {
  private readonly logger = new Logger(StepStatisticsService.name);
  private readonly statistics = new Map<string, StepStatistics>();

  constructor(
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  /**
   * Start tracking a step that is not in the knowledge base, seeded from its own counts
   */
  track(step: TroubleshootingStep): void {
    if (!this.statistics.has(step.id) && !this.lexicons.findStep(step.id)) {
      this.statistics.set(step.id, this.seed(step));
    }
  }

  get(step: TroubleshootingStep): StepStatistics {
    const stored = this.statistics.get(step.id);
    return stored ? { ...stored } : this.seed(step);
  }

  getById(stepId: string): StepStatistics | undefined {
    const stored = this.statistics.get(stepId);
    if (stored) {
      return { ...stored };
    }
    const step = this.lexicons.findStep(stepId);
    return step ? this.seed(step) : undefined;
  }

  record(stepId: string, succeeded: boolean): StepStatistics {
    const current = this.getById(stepId);
    if (!current) {
      throw new UnknownStepError(stepId);
    }

    const alpha = this.config.prioritizer.emaAlpha;
    const outcome = succeeded ? 1 : 0;
    const next: StepStatistics = {
      successCount: current.successCount + outcome,
      attemptCount: current.attemptCount + 1,
      successRate: current.successRate + alpha * (outcome - current.successRate),
    };
    this.statistics.set(stepId, next);
    this.logger.debug(`Recorded ${succeeded ? 'success' : 'failure'} for ${stepId}`);
    return { ...next };
  }

  private seed(step: TroubleshootingStep): StepStatistics {
    const { successCount, attemptCount } = step;
    const successRate = attemptCount > 0 ? successCount / attemptCount : this.config.prioritizer.successPrior;
    return { successCount, attemptCount, successRate };
  }
}
