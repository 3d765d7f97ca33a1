export type TechnicalLevel = 'novice' | 'intermediate' | 'advanced';

export type PatienceLevel = 'low' | 'medium' | 'high';

export type EscalationPriority = 'high' | 'medium' | 'low';

export interface TroubleshootingStep {
  id: string;
  text: { ml: string; en: string };
  technicalDetails: string;
  /** 1 (simple) to 4 (expert) */
  complexity: number;
  estimatedSeconds: number;
  prerequisites: readonly string[];
  successCount: number;
  attemptCount: number;
}

export interface CustomerTechnicalProfile {
  technicalLevel: TechnicalLevel;
  patience: PatienceLevel;
  previousCalls: number;
  successfulResolutions: number;
}

export interface ScoredStep {
  step: TroubleshootingStep;
  score: number;
  factors: StepFactors;
}

export interface StepFactors {
  successProbability: number;
  technicalLevelMatch: number;
  estimatedTime: number;
  complexityVsProfile: number;
}

export interface PrioritizationError {
  code: 'UNKNOWN_PREREQUISITE';
  stepId: string;
  prerequisiteId: string;
  message: string;
}

export type PrioritizationResult =
  | { ok: true; steps: ScoredStep[] }
  | { ok: false; error: PrioritizationError };

export interface StepStatistics {
  successCount: number;
  attemptCount: number;
  /** Moving average of outcomes, used as the success probability */
  successRate: number;
}
