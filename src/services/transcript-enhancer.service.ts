import { Inject, Injectable, Logger } from '@nestjs/common';
import Fuse from 'fuse.js';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import { ConversationHistory, CorpusEntry, Lexicon } from '../interfaces';
import { rewritePhrases } from '../lexicon/phrase-rewriter';
import {
  ZWJ,
  ZWNJ,
  codePointLength,
  collapseWhitespace,
  hasLatin,
  hasMalayalam,
  splitToken,
  splitTokens,
  textKeys,
} from '../lexicon/text.util';
import { LexiconRegistryService } from './lexicon-registry.service';

/**
 * Enhancement stages, in the order they run
 */
export enum EnhancementStage {
  ROMANIZATION = 'romanization',
  CODE_SWITCH = 'code_switch',
  SCRIPT = 'script',
  ERROR_PATTERNS = 'error_patterns',
  NGRAMS = 'ngrams',
  TECHNICAL_TERMS = 'technical_terms',
  FUZZY = 'fuzzy',
  CONTEXT = 'context',
  WHITESPACE = 'whitespace',
}

export interface StageTrace {
  stage: EnhancementStage;
  changed: boolean;
  duration: number;
  error?: string;
}

export interface EnhancementResult {
  text: string;
  stages: StageTrace[];
}

export interface FuzzyCandidate {
  text: string;
  similarity: number;
  frequency: number;
  order: number;
}

/**
 * A token the corpus could not resolve to one entry
 */
interface Ambiguity {
  position: number;
  candidates: FuzzyCandidate[];
}

interface TokenState {
  tokens: string[];
  ambiguities: Ambiguity[];
}

/** Mixed-script token: Latin root followed by a Malayalam suffix */
const MIXED_TOKEN = /^(\p{Script=Latin}+)([\p{Script=Malayalam}\u200C\u200D]+)$/u;

/**
 * Multi-stage STT repair for Malayalam/English code-switched speech.
 *
 * Pipeline: Romanization → Code-switch → Script → Error patterns →
 * N-grams → Technical terms → Fuzzy → Context → Whitespace
 */
@Injectable()
export class TranscriptEnhancerService {
  private readonly logger = new Logger(TranscriptEnhancerService.name);
  private readonly corpusIndexes = new WeakMap<Lexicon, Fuse<CorpusEntry>>();

  /** Legacy chillu encodings (consonant + virama + ZWJ) */
  private static readonly CHILLU_FIXES: ReadonlyArray<[string, string]> = [
    [`ന്${ZWJ}`, 'ൻ'],
    [`ര്${ZWJ}`, 'ർ'],
    [`ല്${ZWJ}`, 'ൽ'],
    [`ള്${ZWJ}`, 'ൾ'],
    [`ണ്${ZWJ}`, 'ൺ'],
  ];

  private static readonly CHARACTER_FIXES: ReadonlyArray<[string, string]> = [
    ['ൻറ്റ', 'ന്റ'],
    ['ൻറ', 'ന്റ'],
    ['്്', '്'],
  ];

  constructor(
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  enhance(text: string, history: ConversationHistory = []): string {
    return this.enhanceWithTrace(text, history).text;
  }

  /**
   * Run every stage and report which ones changed the text.
   * A stage that fails is skipped and its input passes through.
   */
  enhanceWithTrace(text: string, history: ConversationHistory = []): EnhancementResult {
    const lexicon = this.lexicons.current();
    const stages: StageTrace[] = [];
    let current = collapseWhitespace(text);
    if (current.length === 0) {
      return { text: '', stages };
    }

    current = this.executeStage(stages, EnhancementStage.ROMANIZATION, current, (input) =>
      rewritePhrases(splitTokens(input), lexicon.romanization).join(' '),
    );
    current = this.executeStage(stages, EnhancementStage.CODE_SWITCH, current, (input) =>
      this.applyCodeSwitch(input, lexicon),
    );
    current = this.executeStage(stages, EnhancementStage.SCRIPT, current, (input) =>
      this.normalizeScript(input),
    );
    current = this.executeStage(stages, EnhancementStage.ERROR_PATTERNS, current, (input) =>
      this.applyErrorPatterns(input, lexicon),
    );
    current = this.executeStage(stages, EnhancementStage.NGRAMS, current, (input) =>
      rewritePhrases(splitTokens(input), lexicon.ngrams).join(' '),
    );
    current = this.executeStage(stages, EnhancementStage.TECHNICAL_TERMS, current, (input) =>
      rewritePhrases(splitTokens(input), lexicon.technicalTerms).join(' '),
    );

    let state: TokenState = { tokens: splitTokens(current), ambiguities: [] };
    current = this.executeStage(stages, EnhancementStage.FUZZY, current, (input) => {
      state = this.applyFuzzyCorrection(splitTokens(input), lexicon);
      return state.tokens.join(' ');
    });
    current = this.executeStage(stages, EnhancementStage.CONTEXT, current, () =>
      this.applyContextCorrection(state, history, lexicon).join(' '),
    );
    current = this.executeStage(stages, EnhancementStage.WHITESPACE, current, collapseWhitespace);

    return { text: current, stages };
  }

  /**
   * Corpus entries whose similarity to the token reaches the threshold,
   * best first (similarity, then frequency, then declaration order)
   */
  findCandidates(
    token: string,
    threshold: number,
    lexicon: Lexicon = this.lexicons.current(),
  ): FuzzyCandidate[] {
    return this.rankCandidates(token, threshold, this.corpusIndex(lexicon), lexicon.corpus);
  }

  private executeStage(
    stages: StageTrace[],
    stage: EnhancementStage,
    input: string,
    apply: (input: string) => string,
  ): string {
    const start = Date.now();
    try {
      const output = apply(input);
      stages.push({ stage, changed: output !== input, duration: Date.now() - start });
      return output;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Stage ${stage} failed, passing input through: ${message}`);
      stages.push({ stage, changed: false, duration: Date.now() - start, error: message });
      return input;
    }
  }

  private applyCodeSwitch(text: string, lexicon: Lexicon): string {
    return rewritePhrases(splitTokens(text), lexicon.codeSwitch)
      .map((token) => {
        const parts = splitToken(token);
        const mixed = MIXED_TOKEN.exec(parts.core);
        if (!mixed) {
          return token;
        }
        const root = lexicon.codeSwitch.entries.get(mixed[1].toLowerCase());
        return root === undefined ? token : `${parts.lead}${root}${mixed[2]}${parts.trail}`;
      })
      .join(' ');
  }

  private normalizeScript(text: string): string {
    let output = text.normalize('NFC');
    output = output.replace(/\p{Cc}/gu, ' ');
    output = output.replace(/\p{Cf}/gu, (character) =>
      character === ZWJ || character === ZWNJ ? character : '',
    );
    output = output.replace(/([\u200C\u200D])\1+/g, '$1');
    for (const [from, to] of TranscriptEnhancerService.CHILLU_FIXES) {
      output = output.split(from).join(to);
    }
    for (const [from, to] of TranscriptEnhancerService.CHARACTER_FIXES) {
      output = output.split(from).join(to);
    }
    return output.replace(/([.,!?;:।])\1+/g, '$1');
  }

  private applyErrorPatterns(text: string, lexicon: Lexicon): string {
    let output = text;
    for (const errorPattern of lexicon.errorPatterns) {
      output = output.replace(errorPattern.pattern, errorPattern.replacement);
    }
    return output;
  }

  private applyFuzzyCorrection(tokens: string[], lexicon: Lexicon): TokenState {
    const { corpusThreshold, ambiguityMargin } = this.config.fuzzy;
    const corrected = [...tokens];
    const ambiguities: Ambiguity[] = [];

    tokens.forEach((token, position) => {
      const parts = splitToken(token);
      if (!this.isCorrectable(parts.core, lexicon)) {
        return;
      }

      const candidates = this.findCandidates(parts.core, corpusThreshold, lexicon);
      if (candidates.length === 0) {
        return;
      }

      const best = candidates[0];
      corrected[position] = `${parts.lead}${best.text}${parts.trail}`;
      const contenders = candidates.filter(
        (candidate) => best.similarity - candidate.similarity <= ambiguityMargin,
      );
      if (contenders.length > 1) {
        ambiguities.push({ position, candidates: contenders });
      }
      this.logger.debug(`Fuzzy corrected "${parts.core}" to "${best.text}" (${best.similarity.toFixed(3)})`);
    });

    return { tokens: corrected, ambiguities };
  }

  /**
   * History only breaks ties the corpus left open, or repairs a token
   * that is a near miss of a technical term the caller already used.
   */
  private applyContextCorrection(
    state: TokenState,
    history: ConversationHistory,
    lexicon: Lexicon,
  ): string[] {
    const recent = history.slice(-this.config.contextHistoryTurns);
    const mentioned = new Set(recent.flatMap((turn) => textKeys(turn.text)));
    if (mentioned.size === 0) {
      return state.tokens;
    }

    const corrected = [...state.tokens];
    for (const ambiguity of state.ambiguities) {
      const preferred = ambiguity.candidates.filter((candidate) =>
        mentioned.has(candidate.text.toLowerCase()),
      );
      if (preferred.length === 1) {
        const parts = splitToken(corrected[ambiguity.position]);
        corrected[ambiguity.position] = `${parts.lead}${preferred[0].text}${parts.trail}`;
      }
    }

    const contextTerms: CorpusEntry[] = [...mentioned]
      .filter((term) => lexicon.technicalVocabulary.has(term))
      .map((term) => ({ text: term, frequency: 1 }));
    if (contextTerms.length === 0) {
      return corrected;
    }

    const index = new Fuse(contextTerms, this.fuseOptions());
    corrected.forEach((token, position) => {
      const parts = splitToken(token);
      if (!this.isCorrectable(parts.core, lexicon)) {
        return;
      }
      const { contextThreshold } = this.config.fuzzy;
      const candidates = this.rankCandidates(parts.core, contextThreshold, index, contextTerms);
      const unique =
        candidates.length === 1 ||
        (candidates.length > 1 && candidates[0].similarity > candidates[1].similarity);
      if (unique) {
        corrected[position] = `${parts.lead}${candidates[0].text}${parts.trail}`;
      }
    });
    return corrected;
  }

  private isCorrectable(core: string, lexicon: Lexicon): boolean {
    const key = core.toLowerCase();
    return (
      codePointLength(key) >= this.config.fuzzy.minTokenLength &&
      !/\d/.test(key) &&
      !lexicon.canonicalVocabulary.has(key) &&
      (hasLatin(key) || hasMalayalam(key))
    );
  }

  /**
   * Fuse scores approximate substring matches, so its accuracy is scaled
   * by the length ratio to get a whole-token similarity in [0, 1].
   * An entry that contains the token, or is contained in it, only adds or
   * drops characters at the edges and is not a candidate.
   */
  private rankCandidates(
    token: string,
    threshold: number,
    index: Fuse<CorpusEntry>,
    entries: readonly CorpusEntry[],
  ): FuzzyCandidate[] {
    const key = token.toLowerCase();
    const length = codePointLength(key);

    return index
      .search(key)
      .map((result) => {
        const candidateLength = codePointLength(result.item.text);
        const lengthRatio = Math.min(length, candidateLength) / Math.max(length, candidateLength);
        return {
          text: result.item.text,
          similarity: (1 - (result.score ?? 1)) * lengthRatio,
          frequency: result.item.frequency,
          order: entries.indexOf(result.item),
        };
      })
      .filter((candidate) => candidate.similarity >= threshold && !this.differsAtEdges(key, candidate.text))
      .sort(
        (a, b) => b.similarity - a.similarity || b.frequency - a.frequency || a.order - b.order,
      );
  }

  private differsAtEdges(key: string, candidate: string): boolean {
    const text = candidate.toLowerCase();
    return text.includes(key) || key.includes(text);
  }

  private corpusIndex(lexicon: Lexicon): Fuse<CorpusEntry> {
    let index = this.corpusIndexes.get(lexicon);
    if (!index) {
      index = new Fuse(lexicon.corpus, this.fuseOptions());
      this.corpusIndexes.set(lexicon, index);
    }
    return index;
  }

  private fuseOptions() {
    const { corpusThreshold, contextThreshold } = this.config.fuzzy;
    return {
      keys: ['text'],
      includeScore: true,
      ignoreLocation: true,
      ignoreFieldNorm: true,
      threshold: 1 - Math.min(corpusThreshold, contextThreshold),
    };
  }
}
