import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import {
  CustomerTechnicalProfile,
  IssueType,
  PatienceLevel,
  PrioritizationResult,
  ScoredStep,
  StepFactors,
  StepStatistics,
  TechnicalLevel,
  TroubleshootingStep,
} from '../interfaces';
import { LexiconRegistryService } from './lexicon-registry.service';
import { StepStatisticsService } from './step-statistics.service';

/**
 * Orders troubleshooting steps for one call.
 *
 * Composite score = weighted sum of:
 * - success probability (moving average of recorded outcomes)
 * - technical level match (penalty per complexity ordinal above the customer)
 * - estimated time (quick steps first)
 * - complexity vs profile (patience and past resolutions soften complexity)
 *
 * Steps with a prerequisite that has not succeeded yet are removed, not down-weighted.
 */
@Injectable()
export class StepPrioritizerService {
  private readonly logger = new Logger(StepPrioritizerService.name);

  private static readonly LEVEL_ORDINAL: Record<TechnicalLevel, number> = {
    novice: 1,
    intermediate: 2,
    advanced: 3,
  };

  private static readonly PATIENCE_TOLERANCE: Record<PatienceLevel, number> = {
    low: 0,
    medium: 0.5,
    high: 1,
  };

  private static readonly MAX_COMPLEXITY = 4;

  constructor(
    private readonly statistics: StepStatisticsService,
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  /**
   * Knowledge-base steps for an issue type, in declaration order
   */
  stepsFor(issueType: IssueType): TroubleshootingStep[] {
    return this.lexicons.scenariosFor(issueType).flatMap((scenario) => [...scenario.steps]);
  }

  prioritize(
    issueType: IssueType,
    candidates: readonly TroubleshootingStep[],
    profile: CustomerTechnicalProfile,
    succeededStepIds: readonly string[] = [],
  ): PrioritizationResult {
    const succeeded = new Set(succeededStepIds);
    const known = new Set([
      ...candidates.map((step) => step.id),
      ...succeeded,
      ...this.lexicons.current().scenarios.flatMap((scenario) => scenario.steps.map((step) => step.id)),
    ]);

    for (const step of candidates) {
      const unknown = step.prerequisites.find((prerequisite) => !known.has(prerequisite));
      if (unknown !== undefined) {
        const message = `Step ${step.id} requires unknown step ${unknown}`;
        this.logger.warn({
          event: 'prioritize_rejected',
          issueType,
          stepId: step.id,
          prerequisiteId: unknown,
        });
        return {
          ok: false,
          error: { code: 'UNKNOWN_PREREQUISITE', stepId: step.id, prerequisiteId: unknown, message },
        };
      }
    }

    const available = candidates.filter(
      (step) =>
        !succeeded.has(step.id) &&
        step.prerequisites.every((prerequisite) => succeeded.has(prerequisite)),
    );

    const scored = available.map((step): ScoredStep => {
      this.statistics.track(step);
      const factors = this.scoreFactors(step, this.statistics.get(step), profile);
      return { step, factors, score: this.combine(factors) };
    });

    // Array.prototype.sort is stable: equal scores keep candidate order
    scored.sort((a, b) => b.score - a.score);

    this.logger.debug(
      `Prioritized ${scored.length}/${candidates.length} steps for ${issueType}: ` +
        scored.map((entry) => entry.step.id).join(', '),
    );
    return { ok: true, steps: scored };
  }

  recordOutcome(stepId: string, succeeded: boolean): void {
    this.statistics.record(stepId, succeeded);
  }

  scoreFactors(
    step: TroubleshootingStep,
    statistics: StepStatistics,
    profile: CustomerTechnicalProfile,
  ): StepFactors {
    const { timeBaselineSeconds, complexityPenalty } = this.config.prioritizer;

    const successProbability = statistics.successRate;

    const levelGap = step.complexity - StepPrioritizerService.LEVEL_ORDINAL[profile.technicalLevel];
    const technicalLevelMatch = levelGap <= 0 ? 1 : Math.max(0, 1 - complexityPenalty * levelGap);

    const estimatedTime = 1 - Math.min(1, step.estimatedSeconds / timeBaselineSeconds);

    const priorSuccess =
      profile.previousCalls > 0 ? Math.min(1, profile.successfulResolutions / profile.previousCalls) : 0.5;
    const tolerance = (StepPrioritizerService.PATIENCE_TOLERANCE[profile.patience] + priorSuccess) / 2;
    const difficulty = (step.complexity - 1) / (StepPrioritizerService.MAX_COMPLEXITY - 1);
    const complexityVsProfile = 1 - difficulty * (1 - tolerance);

    return { successProbability, technicalLevelMatch, estimatedTime, complexityVsProfile };
  }

  private combine(factors: StepFactors): number {
    const { weights } = this.config.prioritizer;
    return (
      weights.successProbability * factors.successProbability +
      weights.technicalLevelMatch * factors.technicalLevelMatch +
      weights.estimatedTime * factors.estimatedTime +
      weights.complexityVsProfile * factors.complexityVsProfile
    );
  }
}
