import { IssueType } from './classification.interface';
import { TroubleshootingStep, EscalationPriority } from './troubleshooting.interface';

/**
 * Text in both languages of the call
 */
export interface LocalizedText {
  ml: string;
  en: string;
}

/**
 * Deterministic substitution rule. Literal triggers are compiled to
 * boundary-safe regular expressions at load time.
 */
export interface ErrorPattern {
  id: string;
  pattern: RegExp;
  replacement: string;
}

/**
 * Source phrase (lookup form, single-spaced) to target phrase
 */
export interface PhraseTable {
  entries: ReadonlyMap<string, string>;
  /** Longest source phrase, in tokens */
  maxLength: number;
}

export interface CorpusEntry {
  text: string;
  frequency: number;
}

export interface SubIssueDefinition {
  id: string;
  indicators: readonly string[];
}

/**
 * Registry row for one issue type. Declaration order is the tie-break order.
 */
export interface IssueDefinition {
  type: IssueType;
  keywords: readonly string[];
  domainSets: readonly string[];
  vocabulary: ReadonlySet<string>;
  subIssues: readonly SubIssueDefinition[];
}

export interface Scenario {
  id: string;
  issueType: IssueType;
  title: LocalizedText;
  keywords: readonly string[];
  steps: readonly TroubleshootingStep[];
  escalation: {
    condition: string;
    priority: EscalationPriority;
    autoEscalate: boolean;
  };
}

/**
 * Immutable lexicon state. Replaced as a whole, never edited in place.
 */
export interface Lexicon {
  romanization: PhraseTable;
  codeSwitch: PhraseTable;
  errorPatterns: readonly ErrorPattern[];
  ngrams: PhraseTable;
  technicalTerms: PhraseTable;
  corpus: readonly CorpusEntry[];
  /** Every token some table can produce; fuzzy correction leaves these alone */
  canonicalVocabulary: ReadonlySet<string>;
  /** Canonical technical terms, used to read context out of history */
  technicalVocabulary: ReadonlySet<string>;
  silenceTerms: ReadonlySet<string>;
  inappropriateTerms: ReadonlySet<string>;
  stopwords: ReadonlySet<string>;
  domainKeywords: ReadonlyMap<string, readonly string[]>;
  issues: readonly IssueDefinition[];
  escalationKeywords: readonly string[];
  scenarios: readonly Scenario[];
  loadedAt: Date;
}
