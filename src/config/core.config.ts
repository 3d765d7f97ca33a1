/**
 * Core configuration
 *
 * Built once from the environment and passed to every component at
 * construction time under the CORE_CONFIG token.
 */

import * as path from 'path';

export const CORE_CONFIG = 'CORE_CONFIG';

export interface FuzzyConfig {
  /** Minimum similarity against the common-phrase corpus (default: 0.8) */
  corpusThreshold: number;
  /** Minimum similarity against terms taken from conversation history (default: 0.85) */
  contextThreshold: number;
  /** Tokens shorter than this are never fuzzily corrected (default: 3) */
  minTokenLength: number;
  /** Candidates within this distance of the best are ambiguous (default: 0.02) */
  ambiguityMargin: number;
}

export interface PrioritizerWeights {
  successProbability: number;
  technicalLevelMatch: number;
  estimatedTime: number;
  complexityVsProfile: number;
}

export interface PrioritizerConfig {
  weights: PrioritizerWeights;
  /** Success probability of a step that has never been attempted (default: 0.5) */
  successPrior: number;
  /** Learning rate of recordOutcome; share given to the newest outcome (default: 0.1) */
  emaAlpha: number;
  /** Steps at or above this duration get no time credit (default: 300) */
  timeBaselineSeconds: number;
  /** Penalty per complexity ordinal above the customer's level (default: 0.5) */
  complexityPenalty: number;
}

export interface EscalationConfig {
  maxFailedSteps: number;
  maxTotalSteps: number;
  minStepsBeforeEscalation: number;
  minConfidence: number;
}

export interface CoreConfig {
  dataDir: string;
  /** Audio level below which denylisted text is always treated as silence */
  silenceAudioThreshold: number;
  /** Turns of history the enhancer reads for context (default: 3) */
  contextHistoryTurns: number;
  fuzzy: FuzzyConfig;
  classifier: {
    minConfidence: number;
    historyTurns: number;
  };
  prioritizer: PrioritizerConfig;
  escalation: EscalationConfig;
}

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}

/**
 * Load configuration from environment, falling back to defaults
 */
export function loadCoreConfig(): CoreConfig {
  return {
    dataDir: process.env.SUPPORT_CORE_DATA_DIR || path.resolve(__dirname, '..', '..', 'data'),
    silenceAudioThreshold: numberFromEnv('SILENCE_AUDIO_THRESHOLD', 100),
    contextHistoryTurns: numberFromEnv('CONTEXT_HISTORY_TURNS', 3),
    fuzzy: {
      corpusThreshold: numberFromEnv('FUZZY_CORPUS_THRESHOLD', 0.8),
      contextThreshold: numberFromEnv('FUZZY_CONTEXT_THRESHOLD', 0.85),
      minTokenLength: numberFromEnv('FUZZY_MIN_TOKEN_LENGTH', 3),
      ambiguityMargin: numberFromEnv('FUZZY_AMBIGUITY_MARGIN', 0.02),
    },
    classifier: {
      minConfidence: numberFromEnv('CLASSIFIER_MIN_CONFIDENCE', 0.5),
      historyTurns: numberFromEnv('CLASSIFIER_HISTORY_TURNS', 3),
    },
    prioritizer: {
      weights: {
        successProbability: numberFromEnv('STEP_WEIGHT_SUCCESS', 0.5),
        technicalLevelMatch: numberFromEnv('STEP_WEIGHT_LEVEL', 0.3),
        estimatedTime: numberFromEnv('STEP_WEIGHT_TIME', 0.1),
        complexityVsProfile: numberFromEnv('STEP_WEIGHT_COMPLEXITY', 0.1),
      },
      successPrior: numberFromEnv('STEP_SUCCESS_PRIOR', 0.5),
      emaAlpha: numberFromEnv('STEP_EMA_ALPHA', 0.1),
      timeBaselineSeconds: numberFromEnv('STEP_TIME_BASELINE_SECONDS', 300),
      complexityPenalty: numberFromEnv('STEP_COMPLEXITY_PENALTY', 0.5),
    },
    escalation: {
      maxFailedSteps: numberFromEnv('ESCALATION_MAX_FAILED_STEPS', 2),
      maxTotalSteps: numberFromEnv('ESCALATION_MAX_TOTAL_STEPS', 5),
      minStepsBeforeEscalation: numberFromEnv('ESCALATION_MIN_STEPS', 2),
      minConfidence: numberFromEnv('ESCALATION_MIN_CONFIDENCE', 0.6),
    },
  };
}

function checkUnitInterval(errors: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    errors.push(`${name} must be between 0 and 1, got ${value}`);
  }
}

function checkPositive(errors: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Validate configuration
 * Returns array of error messages (empty if valid)
 */
export function validateCoreConfig(config: CoreConfig): string[] {
  const errors: string[] = [];

  if (!config.dataDir) {
    errors.push('dataDir is required');
  }
  if (!Number.isFinite(config.silenceAudioThreshold) || config.silenceAudioThreshold < 0) {
    errors.push(`silenceAudioThreshold must be a non-negative number, got ${config.silenceAudioThreshold}`);
  }
  checkPositive(errors, 'contextHistoryTurns', config.contextHistoryTurns);

  checkUnitInterval(errors, 'fuzzy.corpusThreshold', config.fuzzy.corpusThreshold);
  checkUnitInterval(errors, 'fuzzy.contextThreshold', config.fuzzy.contextThreshold);
  checkUnitInterval(errors, 'fuzzy.ambiguityMargin', config.fuzzy.ambiguityMargin);
  checkPositive(errors, 'fuzzy.minTokenLength', config.fuzzy.minTokenLength);

  checkUnitInterval(errors, 'classifier.minConfidence', config.classifier.minConfidence);
  checkPositive(errors, 'classifier.historyTurns', config.classifier.historyTurns);

  const { weights } = config.prioritizer;
  for (const [name, weight] of Object.entries(weights)) {
    checkUnitInterval(errors, `prioritizer.weights.${name}`, weight);
  }
  const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
  if (Math.abs(total - 1) > 1e-6) {
    errors.push(`prioritizer weights must sum to 1, got ${total}`);
  }
  checkUnitInterval(errors, 'prioritizer.successPrior', config.prioritizer.successPrior);
  if (!(config.prioritizer.emaAlpha > 0 && config.prioritizer.emaAlpha < 1)) {
    errors.push(`prioritizer.emaAlpha must be strictly between 0 and 1, got ${config.prioritizer.emaAlpha}`);
  }
  checkPositive(errors, 'prioritizer.timeBaselineSeconds', config.prioritizer.timeBaselineSeconds);
  checkUnitInterval(errors, 'prioritizer.complexityPenalty', config.prioritizer.complexityPenalty);

  checkPositive(errors, 'escalation.maxFailedSteps', config.escalation.maxFailedSteps);
  checkPositive(errors, 'escalation.maxTotalSteps', config.escalation.maxTotalSteps);
  checkPositive(errors, 'escalation.minStepsBeforeEscalation', config.escalation.minStepsBeforeEscalation);
  checkUnitInterval(errors, 'escalation.minConfidence', config.escalation.minConfidence);

  return errors;
}

let cachedConfig: CoreConfig | null = null;

/**
 * Get configuration (singleton)
 */
export function getCoreConfig(): CoreConfig {
  if (!cachedConfig) {
    cachedConfig = loadCoreConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached config (for testing)
 */
export function resetCoreConfig(): void {
  cachedConfig = null;
}
