import { Injectable, Logger } from '@nestjs/common';
import {
  ClassificationContext,
  ClassificationResult,
  ConversationHistory,
  CustomerTechnicalProfile,
  IssueType,
  PrioritizationError,
  ScoredStep,
} from '../interfaces';
import { IssueClassifierService } from './issue-classifier.service';
import { StepPrioritizerService } from './step-prioritizer.service';
import { TextNormalizerService } from './text-normalizer.service';
import { TranscriptEnhancerService } from './transcript-enhancer.service';

export enum PipelineStage {
  NORMALIZE = 'normalize',
  ENHANCE = 'enhance',
  CLASSIFY = 'classify',
  PRIORITIZE = 'prioritize',
}

/**
 * Individual stage result for observability
 */
export interface StageResult {
  stage: PipelineStage;
  success: boolean;
  duration: number;
}

export interface UtteranceInput {
  text: string;
  audioLevel?: number;
  history: ConversationHistory;
  profile: CustomerTechnicalProfile;
  context?: ClassificationContext;
  /** Steps that already succeeded in this call */
  succeededStepIds?: readonly string[];
}

export interface PipelineResult {
  success: boolean;
  /** True when the utterance was treated as silence; ask the caller again */
  silence: boolean;
  normalized: string;
  enhanced: string;
  classification: ClassificationResult;
  steps: ScoredStep[];
  error?: PrioritizationError;
  processingTime: number;
  stages: StageResult[];
}

/**
 * Runs one customer utterance through the core.
 *
 * Pipeline: Normalize → Enhance → Classify → Prioritize
 */
@Injectable()
export class SupportPipelineService {
  private readonly logger = new Logger(SupportPipelineService.name);

  constructor(
    private readonly normalizer: TextNormalizerService,
    private readonly enhancer: TranscriptEnhancerService,
    private readonly classifier: IssueClassifierService,
    private readonly prioritizer: StepPrioritizerService,
  ) {}

  process(input: UtteranceInput): PipelineResult {
    const start = Date.now();
    const stages: StageResult[] = [];

    const normalized = this.executeStage(stages, PipelineStage.NORMALIZE, () =>
      this.normalizer.normalize(input.text, input.audioLevel),
    );
    if (normalized.length === 0) {
      return {
        success: true,
        silence: true,
        normalized,
        enhanced: '',
        classification: this.classifier.classify(''),
        steps: [],
        processingTime: Date.now() - start,
        stages,
      };
    }

    const enhanced = this.executeStage(stages, PipelineStage.ENHANCE, () =>
      this.enhancer.enhance(normalized, input.history),
    );
    const classification = this.executeStage(stages, PipelineStage.CLASSIFY, () =>
      this.classifier.classify(enhanced, this.enhanceCustomerTurns(input.history), input.context),
    );

    let steps: ScoredStep[] = [];
    let error: PrioritizationError | undefined;
    if (classification.issueType !== IssueType.UNCLASSIFIED) {
      const prioritized = this.executeStage(stages, PipelineStage.PRIORITIZE, () =>
        this.prioritizer.prioritize(
          classification.issueType,
          this.prioritizer.stepsFor(classification.issueType),
          input.profile,
          input.succeededStepIds,
        ),
      );
      if (prioritized.ok) {
        steps = prioritized.steps;
      } else {
        error = prioritized.error;
        stages[stages.length - 1].success = false;
      }
    }

    const processingTime = Date.now() - start;
    this.logger.log(
      `Utterance processed in ${processingTime}ms: ${classification.issueType} ` +
        `(${classification.confidence.toFixed(2)}), ${steps.length} steps`,
    );

    return {
      success: error === undefined,
      silence: false,
      normalized,
      enhanced,
      classification,
      steps,
      ...(error ? { error } : {}),
      processingTime,
      stages,
    };
  }

  /**
   * Classifier keywords are in enhanced form, so earlier customer turns
   * go through the enhancer before they are re-scored
   */
  private enhanceCustomerTurns(history: ConversationHistory): ConversationHistory {
    return history.map((turn) =>
      turn.role === 'customer' ? { ...turn, text: this.enhancer.enhance(turn.text) } : turn,
    );
  }

  private executeStage<T>(stages: StageResult[], stage: PipelineStage, run: () => T): T {
    const start = Date.now();
    const result = run();
    stages.push({ stage, success: true, duration: Date.now() - start });
    return result;
  }
}
