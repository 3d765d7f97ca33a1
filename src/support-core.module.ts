import { DynamicModule, Module } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig, getCoreConfig, validateCoreConfig } from './config/core.config';
import { EscalationService } from './services/escalation.service';
import { IssueClassifierService } from './services/issue-classifier.service';
import { LexiconRegistryService } from './services/lexicon-registry.service';
import { StepPrioritizerService } from './services/step-prioritizer.service';
import { StepStatisticsService } from './services/step-statistics.service';
import { SupportPipelineService } from './services/support-pipeline.service';
import { TextNormalizerService } from './services/text-normalizer.service';
import { TranscriptEnhancerService } from './services/transcript-enhancer.service';

const SERVICES = [
  LexiconRegistryService,
  StepStatisticsService,
  TextNormalizerService,
  TranscriptEnhancerService,
  IssueClassifierService,
  StepPrioritizerService,
  EscalationService,
  SupportPipelineService,
];

export function resolveCoreConfig(overrides: Partial<CoreConfig> = {}): CoreConfig {
  const config = Object.freeze({ ...getCoreConfig(), ...overrides });
  const errors = validateCoreConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid core configuration: ${errors.join('; ')}`);
  }
  return config;
}

@Module({})
export class SupportCoreModule {
  /**
   * Register the core services. Configuration is validated and the lexicon
   * loaded while the container starts, so a bad table fails the boot.
   */
  static forRoot(overrides: Partial<CoreConfig> = {}): DynamicModule {
    return {
      module: SupportCoreModule,
      providers: [{ provide: CORE_CONFIG, useFactory: () => resolveCoreConfig(overrides) }, ...SERVICES],
      exports: [CORE_CONFIG, ...SERVICES],
    };
  }
}
