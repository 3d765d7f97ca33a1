import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import { Lexicon } from '../interfaces';
import { collapseWhitespace, splitTokens, tokenKey } from '../lexicon/text.util';
import { LexiconRegistryService } from './lexicon-registry.service';

export type SilenceReason = 'single_character' | 'no_words' | 'denylist_short_input' | 'low_audio_level';

/**
 * First pass over recognized text: whitespace, silence misrecognitions and
 * inappropriate terms. Returns "" for anything that should be treated as silence.
 */
@Injectable()
export class TextNormalizerService {
  private readonly logger = new Logger(TextNormalizerService.name);

  /** Silence denylist only applies to utterances this short */
  private static readonly MAX_SILENCE_TOKENS = 2;

  constructor(
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  /**
   * @param audioLevel - optional level from the speech pipeline, used only to corroborate silence
   */
  normalize(raw: string, audioLevel?: number): string {
    const lexicon = this.lexicons.current();
    const text = collapseWhitespace(raw);
    if (text.length === 0) {
      return '';
    }

    const reason = this.detectSilence(text, audioLevel, lexicon);
    if (reason) {
      this.logger.log({ event: 'silence_detected', reason, text });
      return '';
    }

    return collapseWhitespace(this.filterContent(text, lexicon));
  }

  /**
   * Best-effort heuristic; a result of undefined means the text is treated as speech
   */
  detectSilence(
    text: string,
    audioLevel: number | undefined,
    lexicon: Lexicon = this.lexicons.current(),
  ): SilenceReason | undefined {
    if (text.length === 1 && !/\d/.test(text)) {
      return 'single_character';
    }

    const keys = splitTokens(text).map(tokenKey);
    if (keys.every((key) => key.length === 0)) {
      return 'no_words';
    }

    const denylisted = keys.filter((key) => lexicon.silenceTerms.has(key));
    if (
      denylisted.length > 0 &&
      audioLevel !== undefined &&
      audioLevel < this.config.silenceAudioThreshold
    ) {
      return 'low_audio_level';
    }
    if (keys.length <= TextNormalizerService.MAX_SILENCE_TOKENS && denylisted.length === keys.length) {
      return 'denylist_short_input';
    }
    return undefined;
  }

  private filterContent(text: string, lexicon: Lexicon): string {
    const kept: string[] = [];
    for (const token of splitTokens(text)) {
      const key = tokenKey(token);
      if (lexicon.inappropriateTerms.has(key)) {
        this.logger.warn({ event: 'content_filtered', term: key, reason: 'inappropriate_term' });
        continue;
      }
      kept.push(token);
    }
    return kept.join(' ');
  }
}
