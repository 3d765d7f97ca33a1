import { ClassificationResult } from './classification.interface';
import { ConversationHistory } from './conversation.interface';
import { EscalationPriority } from './troubleshooting.interface';

export enum EscalationReason {
  CUSTOMER_REQUEST = 'customer_request',
  FAILED_STEPS = 'failed_steps',
  STEP_LIMIT = 'step_limit',
  LOW_CONFIDENCE = 'low_confidence',
  AUTO_ESCALATE_ISSUE = 'auto_escalate_issue',
}

export interface EscalationInput {
  classification: ClassificationResult;
  history: ConversationHistory;
  attemptedSteps: number;
  failedSteps: number;
}

export interface EscalationDecision {
  escalate: boolean;
  reasons: EscalationReason[];
  priority: EscalationPriority;
}
