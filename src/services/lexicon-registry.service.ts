import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import { IssueType, Lexicon, Scenario, TroubleshootingStep } from '../interfaces';
import { loadLexicon } from '../lexicon/lexicon-loader';

/**
 * Holds the active lexicon. Readers take one snapshot per call; reloads
 * build a complete replacement before swapping the reference.
 */
@Injectable()
export class LexiconRegistryService {
  private readonly logger = new Logger(LexiconRegistryService.name);
  private lexicon: Lexicon;

  constructor(@Inject(CORE_CONFIG) private readonly config: CoreConfig) {
    this.lexicon = loadLexicon(config.dataDir);
    this.logSummary('Lexicon loaded', this.lexicon);
  }

  current(): Lexicon {
    return this.lexicon;
  }

  swap(next: Lexicon): void {
    this.lexicon = next;
    this.logSummary('Lexicon swapped', next);
  }

  /**
   * Load tables from disk and swap them in. On failure the current
   * lexicon stays active and the LexiconLoadError propagates.
   */
  reload(dataDir: string = this.config.dataDir): Lexicon {
    const next = loadLexicon(dataDir);
    this.swap(next);
    return next;
  }

  scenariosFor(issueType: IssueType): Scenario[] {
    return this.lexicon.scenarios.filter((scenario) => scenario.issueType === issueType);
  }

  findStep(stepId: string): TroubleshootingStep | undefined {
    for (const scenario of this.lexicon.scenarios) {
      const step = scenario.steps.find((candidate) => candidate.id === stepId);
      if (step) {
        return step;
      }
    }
    return undefined;
  }

  private logSummary(message: string, lexicon: Lexicon): void {
    this.logger.log({
      event: 'lexicon_ready',
      message,
      romanization: lexicon.romanization.entries.size,
      errorPatterns: lexicon.errorPatterns.length,
      corpus: lexicon.corpus.length,
      issues: lexicon.issues.length,
      scenarios: lexicon.scenarios.length,
    });
  }
}
