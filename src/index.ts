// Malayalam/English ISP voice support core
// Transcript enhancement, issue classification and step prioritization

import 'reflect-metadata';

// Interfaces
export * from './interfaces';

// Configuration
export {
  CORE_CONFIG,
  CoreConfig,
  FuzzyConfig,
  PrioritizerConfig,
  PrioritizerWeights,
  EscalationConfig,
  loadCoreConfig,
  validateCoreConfig,
  getCoreConfig,
  resetCoreConfig,
} from './config/core.config';

// Lexicon
export { LexiconLoadError, buildLexicon, loadLexicon, readLexiconDocuments } from './lexicon/lexicon-loader';
export { LexiconDocuments } from './lexicon/lexicon.schema';

// Services
export { LexiconRegistryService } from './services/lexicon-registry.service';
export { StepStatisticsService, UnknownStepError } from './services/step-statistics.service';
export { TextNormalizerService, SilenceReason } from './services/text-normalizer.service';
export {
  TranscriptEnhancerService,
  EnhancementStage,
  EnhancementResult,
  StageTrace,
  FuzzyCandidate,
} from './services/transcript-enhancer.service';
export { IssueClassifierService, CandidateScore } from './services/issue-classifier.service';
export { StepPrioritizerService } from './services/step-prioritizer.service';
export { EscalationService } from './services/escalation.service';
export {
  SupportPipelineService,
  PipelineStage,
  PipelineResult,
  StageResult,
  UtteranceInput,
} from './services/support-pipeline.service';

// Module
export { SupportCoreModule, resolveCoreConfig } from './support-core.module';
