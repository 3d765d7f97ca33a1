import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import {
  EscalationDecision,
  EscalationInput,
  EscalationPriority,
  EscalationReason,
  IssueType,
} from '../interfaces';
import { findPhrase, textKeys } from '../lexicon/text.util';
import { LexiconRegistryService } from './lexicon-registry.service';

const PRIORITY_RANK: Record<EscalationPriority, number> = { low: 0, medium: 1, high: 2 };

/**
 * Decides when a call should be handed to a human agent
 */
@Injectable()
export class EscalationService {
  private readonly logger = new Logger(EscalationService.name);

  private static readonly REASON_PRIORITY: Record<EscalationReason, EscalationPriority> = {
    [EscalationReason.CUSTOMER_REQUEST]: 'high',
    [EscalationReason.FAILED_STEPS]: 'medium',
    [EscalationReason.STEP_LIMIT]: 'medium',
    [EscalationReason.LOW_CONFIDENCE]: 'low',
    [EscalationReason.AUTO_ESCALATE_ISSUE]: 'low',
  };

  constructor(
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  evaluate(input: EscalationInput): EscalationDecision {
    const criteria = this.config.escalation;
    const reasons: EscalationReason[] = [];
    let priority: EscalationPriority = 'low';

    const raise = (
      reason: EscalationReason,
      reasonPriority: EscalationPriority = EscalationService.REASON_PRIORITY[reason],
    ) => {
      reasons.push(reason);
      if (PRIORITY_RANK[reasonPriority] > PRIORITY_RANK[priority]) {
        priority = reasonPriority;
      }
    };

    if (this.customerAskedForHuman(input)) {
      raise(EscalationReason.CUSTOMER_REQUEST);
    }
    if (input.failedSteps >= criteria.maxFailedSteps) {
      raise(EscalationReason.FAILED_STEPS);
    }
    if (input.attemptedSteps >= criteria.maxTotalSteps) {
      raise(EscalationReason.STEP_LIMIT);
    }
    if (
      input.attemptedSteps >= criteria.minStepsBeforeEscalation &&
      input.classification.confidence < criteria.minConfidence
    ) {
      raise(EscalationReason.LOW_CONFIDENCE);
    }

    const issueType = input.classification.issueType;
    if (issueType !== IssueType.UNCLASSIFIED) {
      const scenario = this.lexicons
        .scenariosFor(issueType)
        .find((candidate) => candidate.escalation.autoEscalate);
      if (scenario) {
        raise(EscalationReason.AUTO_ESCALATE_ISSUE, scenario.escalation.priority);
      }
    }

    const decision: EscalationDecision = { escalate: reasons.length > 0, reasons, priority };
    if (decision.escalate) {
      this.logger.log({ event: 'escalation_decided', issueType, reasons, priority });
    }
    return decision;
  }

  private customerAskedForHuman(input: EscalationInput): boolean {
    const keywords = this.lexicons.current().escalationKeywords.map(textKeys);
    return input.history
      .filter((turn) => turn.role === 'customer')
      .slice(-this.config.contextHistoryTurns)
      .some((turn) => {
        const keys = textKeys(turn.text);
        return keywords.some((keyword) => findPhrase(keys, keyword) >= 0);
      });
  }
}
