import { Inject, Injectable, Logger } from '@nestjs/common';
import { CORE_CONFIG, CoreConfig } from '../config/core.config';
import {
  ClassificationContext,
  ClassificationResult,
  ConversationHistory,
  IssueDefinition,
  IssueType,
  KeywordMatch,
  Lexicon,
  MatchTier,
  TechnicalParameters,
} from '../interfaces';
import { findPhrase, textKeys } from '../lexicon/text.util';
import { LexiconRegistryService } from './lexicon-registry.service';

export interface CandidateScore {
  definition: IssueDefinition;
  score: number;
  confidence: number;
  matches: KeywordMatch[];
}

interface ScoredText {
  text: string;
  best: CandidateScore | undefined;
}

/** Unit multipliers into Mbps */
const SPEED_UNITS: Record<string, number> = { gbps: 1000, mbps: 1, kbps: 0.001 };

/**
 * Keyword/pattern issue classifier over Malayalam and English.
 *
 * Tiers are scored top-down and each tier consumes the tokens it matched,
 * so a word counted as a type keyword is not counted again as a domain or
 * loose word match.
 */
@Injectable()
export class IssueClassifierService {
  private readonly logger = new Logger(IssueClassifierService.name);

  static readonly TIER_WEIGHTS: Record<MatchTier, number> = {
    [MatchTier.AREA]: 10,
    [MatchTier.TYPE]: 8,
    [MatchTier.DOMAIN]: 3,
    [MatchTier.WORD]: 2,
  };

  private readonly parameterPatterns: Map<string, RegExp> = new Map([
    ['speed', /(\d+(?:\.\d+)?)\s*(gbps|mbps|kbps)(?![a-z])/],
    ['minutes', /(\d+)\s*(?:minutes?|mins?|മിനിറ്റ്)(?![a-z])/],
    ['hours', /(\d+)\s*(?:hours?|hrs?|മണിക്കൂർ)(?![a-z])/],
    ['days', /(\d+)\s*(?:days?|ദിവസം)(?![a-z])/],
    ['devices', /(\d+)\s*(?:devices?|phones?|ഉപകരണങ്ങൾ)(?![a-z])/],
    ['errorCode', /error\s*code\s*:?\s*([a-z0-9-]+)/g],
  ]);

  constructor(
    private readonly lexicons: LexiconRegistryService,
    @Inject(CORE_CONFIG) private readonly config: CoreConfig,
  ) {}

  classify(
    text: string,
    history: ConversationHistory = [],
    context: ClassificationContext = {},
  ): ClassificationResult {
    const lexicon = this.lexicons.current();
    const { minConfidence, historyTurns } = this.config.classifier;

    let scored = this.scoreText(text, context, lexicon);
    let usedHistory = false;

    if ((scored.best?.confidence ?? 0) < minConfidence) {
      const earlier = history
        .filter((turn) => turn.role === 'customer')
        .slice(-historyTurns)
        .reverse()
        .map((turn) => turn.text);

      if (earlier.length > 0) {
        const combined = this.scoreText([text, ...earlier].join(' '), context, lexicon);
        if ((combined.best?.confidence ?? 0) > (scored.best?.confidence ?? 0)) {
          this.logger.debug(`Classification recovered from ${earlier.length} earlier turns`);
          scored = combined;
          usedHistory = true;
        }
      }
    }

    const parameters = this.extractParameters(scored.text);
    const best = scored.best;
    if (!best) {
      return {
        issueType: IssueType.UNCLASSIFIED,
        confidence: 0,
        score: 0,
        matches: [],
        parameters,
        usedHistory,
      };
    }

    const subIssue = this.detectSubIssue(best.definition, textKeys(scored.text));
    this.logger.debug(
      `Classified as ${best.definition.type}${subIssue ? `/${subIssue}` : ''} ` +
        `(score ${best.score}, confidence ${best.confidence.toFixed(2)})`,
    );

    return {
      issueType: best.definition.type,
      ...(subIssue ? { subIssue } : {}),
      confidence: best.confidence,
      score: best.score,
      matches: best.matches,
      parameters,
      usedHistory,
    };
  }

  /**
   * Score every registered issue type; index order is declaration order
   */
  scoreCandidates(
    text: string,
    context: ClassificationContext = {},
    lexicon: Lexicon = this.lexicons.current(),
  ): CandidateScore[] {
    const keys = textKeys(text);
    return lexicon.issues.map((definition) => this.scoreCandidate(definition, keys, context, lexicon));
  }

  extractParameters(text: string): TechnicalParameters {
    const lower = text.toLowerCase();
    const parameters: TechnicalParameters = { errorCodes: [] };

    for (const [name, pattern] of this.parameterPatterns) {
      if (name === 'errorCode') {
        for (const match of lower.matchAll(pattern)) {
          parameters.errorCodes.push(match[1]);
        }
        continue;
      }

      const match = pattern.exec(lower);
      if (!match) {
        continue;
      }
      const value = Number(match[1]);
      switch (name) {
        case 'speed':
          parameters.speedMbps = value * (SPEED_UNITS[match[2]] ?? 1);
          break;
        case 'minutes':
          parameters.durationMinutes ??= value;
          break;
        case 'hours':
          parameters.durationMinutes ??= value * 60;
          break;
        case 'days':
          parameters.durationMinutes ??= value * 60 * 24;
          break;
        case 'devices':
          parameters.deviceCount = value;
          break;
      }
    }

    return parameters;
  }

  private scoreText(text: string, context: ClassificationContext, lexicon: Lexicon): ScoredText {
    let best: CandidateScore | undefined;
    for (const candidate of this.scoreCandidates(text, context, lexicon)) {
      // Strictly greater: earlier declarations win ties
      if (candidate.score > 0 && (!best || candidate.score > best.score)) {
        best = candidate;
      }
    }
    return { text, best };
  }

  private scoreCandidate(
    definition: IssueDefinition,
    keys: readonly string[],
    context: ClassificationContext,
    lexicon: Lexicon,
  ): CandidateScore {
    const weights = IssueClassifierService.TIER_WEIGHTS;
    const consumed = keys.map(() => false);
    const consume = (start: number, length: number) => {
      for (let offset = 0; offset < length; offset++) {
        consumed[start + offset] = true;
      }
    };
    const consumeAll = (phrase: readonly string[]): boolean => {
      let found = false;
      let start = findPhrase(keys, phrase, consumed);
      while (start >= 0) {
        consume(start, phrase.length);
        found = true;
        start = findPhrase(keys, phrase, consumed);
      }
      return found;
    };

    const matches: KeywordMatch[] = [];
    let score = 0;

    // Area: an open incident of this type where the customer is, or named in the text
    const incidents = (context.activeIncidents ?? []).filter(
      (incident) => incident.issueType === definition.type,
    );
    const customerArea = context.customerArea?.trim().toLowerCase();
    let areaMatched = false;
    for (const incident of incidents) {
      const area = incident.area.trim().toLowerCase();
      if ((customerArea && area === customerArea) || consumeAll(textKeys(area))) {
        matches.push({ tier: MatchTier.AREA, term: incident.area, score: weights[MatchTier.AREA] });
        score += weights[MatchTier.AREA];
        areaMatched = true;
        break;
      }
    }

    // Type: one award per category, every matched keyword consumed
    let typeMatched = false;
    for (const keyword of definition.keywords) {
      if (consumeAll(textKeys(keyword)) && !typeMatched) {
        matches.push({ tier: MatchTier.TYPE, term: keyword, score: weights[MatchTier.TYPE] });
        score += weights[MatchTier.TYPE];
        typeMatched = true;
      }
    }

    for (const setName of definition.domainSets) {
      let setMatched = false;
      for (const term of lexicon.domainKeywords.get(setName) ?? []) {
        setMatched = consumeAll(textKeys(term)) || setMatched;
      }
      if (setMatched) {
        matches.push({ tier: MatchTier.DOMAIN, term: setName, score: weights[MatchTier.DOMAIN] });
        score += weights[MatchTier.DOMAIN];
      }
    }

    const counted = new Set<string>();
    keys.forEach((key, position) => {
      if (consumed[position] || counted.has(key) || lexicon.stopwords.has(key)) {
        return;
      }
      if (definition.vocabulary.has(key)) {
        counted.add(key);
        matches.push({ tier: MatchTier.WORD, term: key, score: weights[MatchTier.WORD] });
        score += weights[MatchTier.WORD];
      }
    });

    // Strong tiers that could have matched but did not
    let missing = typeMatched ? 0 : weights[MatchTier.TYPE];
    if (incidents.length > 0 && !areaMatched) {
      missing += weights[MatchTier.AREA];
    }
    const confidence = score > 0 ? Math.min(1, score / (score + missing)) : 0;

    return { definition, score, confidence, matches };
  }

  private detectSubIssue(definition: IssueDefinition, keys: readonly string[]): string | undefined {
    const subIssue = definition.subIssues.find((candidate) =>
      candidate.indicators.some((indicator) => findPhrase(keys, textKeys(indicator)) >= 0),
    );
    return subIssue?.id;
  }
}
