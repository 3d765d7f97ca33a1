import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  CorpusEntry,
  ErrorPattern,
  IssueDefinition,
  IssueType,
  Lexicon,
  PhraseTable,
  Scenario,
  TroubleshootingStep,
} from '../interfaces';
import {
  LexiconDocuments,
  commonPhrasesSchema,
  domainKeywordsSchema,
  errorPatternsSchema,
  escalationSchema,
  filtersSchema,
  issuesSchema,
  knowledgeBaseSchema,
  phraseTableSchema,
  technicalTermsSchema,
} from './lexicon.schema';
import { createPhraseTable, rewriteText } from './phrase-rewriter';
import { boundaryPattern, splitTokens, textKeys } from './text.util';

export const LEXICON_DIR = 'lexicon';
export const KNOWLEDGE_BASE_DIR = 'knowledge-base';

/**
 * Raised when any table is missing, malformed or inconsistent.
 * The process must not serve requests against a partial lexicon.
 */
export class LexiconLoadError extends Error {
  constructor(readonly problems: string[]) {
    super(`Lexicon failed to load:\n - ${problems.join('\n - ')}`);
    this.name = 'LexiconLoadError';
  }
}

function parseDocument<T>(
  file: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  problems: string[],
): T | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    problems.push(`${file}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      problems.push(`${file}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return undefined;
  }
  return parsed.data;
}

/**
 * Read and validate every table under dataDir
 */
export function readLexiconDocuments(dataDir: string): LexiconDocuments {
  const problems: string[] = [];
  const lexiconFile = (name: string) => path.join(dataDir, LEXICON_DIR, name);

  const romanization = parseDocument(lexiconFile('romanization.json'), phraseTableSchema, problems);
  const codeSwitch = parseDocument(lexiconFile('code-switch.json'), phraseTableSchema, problems);
  const errorPatterns = parseDocument(lexiconFile('error-patterns.json'), errorPatternsSchema, problems);
  const ngrams = parseDocument(lexiconFile('ngrams.json'), phraseTableSchema, problems);
  const technicalTerms = parseDocument(lexiconFile('technical-terms.json'), technicalTermsSchema, problems);
  const commonPhrases = parseDocument(lexiconFile('common-phrases.json'), commonPhrasesSchema, problems);
  const filters = parseDocument(lexiconFile('filters.json'), filtersSchema, problems);
  const domainKeywords = parseDocument(lexiconFile('domain-keywords.json'), domainKeywordsSchema, problems);
  const issues = parseDocument(lexiconFile('issues.json'), issuesSchema, problems);
  const escalation = parseDocument(lexiconFile('escalation.json'), escalationSchema, problems);

  const knowledgeBase: LexiconDocuments['knowledgeBase'] = [];
  const knowledgeBaseDir = path.join(dataDir, KNOWLEDGE_BASE_DIR);
  let knowledgeBaseFiles: string[] = [];
  try {
    knowledgeBaseFiles = fs
      .readdirSync(knowledgeBaseDir)
      .filter((name) => name.endsWith('.json'))
      .sort();
  } catch (error) {
    problems.push(`${knowledgeBaseDir}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (knowledgeBaseFiles.length === 0 && problems.length === 0) {
    problems.push(`${knowledgeBaseDir}: no scenario documents found`);
  }
  for (const name of knowledgeBaseFiles) {
    const document = parseDocument(path.join(knowledgeBaseDir, name), knowledgeBaseSchema, problems);
    if (document) {
      knowledgeBase.push(document);
    }
  }

  if (
    problems.length > 0 ||
    !romanization ||
    !codeSwitch ||
    !errorPatterns ||
    !ngrams ||
    !technicalTerms ||
    !commonPhrases ||
    !filters ||
    !domainKeywords ||
    !issues ||
    !escalation
  ) {
    throw new LexiconLoadError(problems);
  }

  return {
    romanization,
    codeSwitch,
    errorPatterns,
    ngrams,
    technicalTerms,
    commonPhrases,
    filters,
    domainKeywords,
    issues,
    escalation,
    knowledgeBase,
  };
}

function compileErrorPatterns(
  documents: LexiconDocuments['errorPatterns'],
  problems: string[],
): ErrorPattern[] {
  const compiled: ErrorPattern[] = [];

  for (const document of documents.patterns) {
    let pattern: RegExp;
    let replacement: string;
    let sample: string;

    if ('literal' in document) {
      pattern = boundaryPattern(document.literal);
      replacement = document.replacement.replace(/\$/g, '$$$$');
      sample = document.literal;
    } else {
      try {
        pattern = new RegExp(document.regex, `g${document.flags ?? ''}u`);
      } catch (error) {
        problems.push(`error pattern ${document.id}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }
      replacement = document.replacement;
      sample = document.example;
    }

    const once = sample.replace(pattern, replacement);
    if (once === sample) {
      problems.push(`error pattern ${document.id}: does not match its own example`);
    } else if (once.replace(pattern, replacement) !== once) {
      problems.push(`error pattern ${document.id}: replacement is matched again by its trigger`);
    }

    compiled.push(Object.freeze({ id: document.id, pattern, replacement }));
  }

  return compiled;
}

function buildTechnicalTerms(
  documents: LexiconDocuments['technicalTerms'],
  problems: string[],
): PhraseTable {
  const pairs: [string, string][] = [];
  const seen = new Map<string, string>();

  for (const group of documents.groups) {
    for (const variant of group.variants) {
      const key = textKeys(variant).join(' ');
      const previous = seen.get(key);
      if (previous !== undefined && previous !== group.canonical) {
        problems.push(`technical term "${variant}" maps to both "${previous}" and "${group.canonical}"`);
        continue;
      }
      seen.set(key, group.canonical);
      pairs.push([variant, group.canonical]);
    }
  }

  return createPhraseTable(pairs);
}

function checkFixpoints(
  label: string,
  targets: Iterable<string>,
  tables: readonly PhraseTable[],
  problems: string[],
): void {
  for (const target of targets) {
    for (const table of tables) {
      if (rewriteText(target, table) !== splitTokens(target).join(' ')) {
        problems.push(`${label} "${target}" would be rewritten again`);
        break;
      }
    }
  }
}

function checkNotReserved(
  label: string,
  targets: Iterable<string>,
  reserved: readonly PhraseTable[],
  problems: string[],
): void {
  for (const target of targets) {
    for (const key of textKeys(target)) {
      if (reserved.some((table) => table.entries.has(key))) {
        problems.push(`${label} "${target}" contains "${key}", which romanization or code-switch rewrites`);
      }
    }
  }
}

/**
 * Tables the enhancer applies before fuzzy correction, in stage order
 */
interface RewriteTables {
  romanization: PhraseTable;
  codeSwitch: PhraseTable;
  errorPatterns: readonly ErrorPattern[];
  ngrams: PhraseTable;
  technicalTerms: PhraseTable;
}

function tableForm(text: string, tables: RewriteTables): string {
  let output = rewriteText(text, tables.romanization);
  output = rewriteText(output, tables.codeSwitch);
  for (const errorPattern of tables.errorPatterns) {
    output = output.replace(errorPattern.pattern, errorPattern.replacement);
  }
  output = rewriteText(output, tables.ngrams);
  return rewriteText(output, tables.technicalTerms);
}

/**
 * Classifier terms are matched against enhanced text, so each one must
 * already be in the form the rewrite tables produce
 */
function checkEnhancedForm(
  label: string,
  targets: Iterable<string>,
  tables: RewriteTables,
  problems: string[],
): void {
  for (const target of targets) {
    const rewritten = tableForm(target, tables);
    if (rewritten !== splitTokens(target).join(' ')) {
      problems.push(`${label} "${target}" would be rewritten to "${rewritten}"`);
    }
  }
}

function buildIssues(
  documents: LexiconDocuments,
  stopwords: ReadonlySet<string>,
  tables: RewriteTables,
  problems: string[],
): IssueDefinition[] {
  const declared = new Set<IssueType>();
  const definitions: IssueDefinition[] = [];

  for (const issue of documents.issues.issues) {
    if (declared.has(issue.type)) {
      problems.push(`issue type ${issue.type} declared more than once`);
      continue;
    }
    declared.add(issue.type);

    checkEnhancedForm(`${issue.type} keyword`, issue.keywords, tables, problems);
    for (const subIssue of issue.subIssues) {
      checkEnhancedForm(`${issue.type}/${subIssue.id} indicator`, subIssue.indicators, tables, problems);
    }

    for (const set of issue.domainSets) {
      if (!(set in documents.domainKeywords.sets)) {
        problems.push(`issue type ${issue.type} references unknown domain set "${set}"`);
      }
    }

    const keywords = [...issue.keywords].sort(
      (a, b) => splitTokens(b).length - splitTokens(a).length || b.length - a.length,
    );
    const vocabulary = new Set(
      [
        ...issue.keywords,
        tableForm(issue.description.en, tables),
        tableForm(issue.description.ml, tables),
      ]
        .flatMap(textKeys)
        .filter((key) => !stopwords.has(key)),
    );

    definitions.push(
      Object.freeze({
        type: issue.type,
        keywords: Object.freeze(keywords),
        domainSets: Object.freeze([...issue.domainSets]),
        vocabulary,
        subIssues: Object.freeze(
          issue.subIssues.map((subIssue) =>
            Object.freeze({ id: subIssue.id, indicators: Object.freeze([...subIssue.indicators]) }),
          ),
        ),
      }),
    );
  }

  for (const type of Object.values(IssueType)) {
    if (type !== IssueType.UNCLASSIFIED && !declared.has(type)) {
      problems.push(`issue type ${type} has no registry entry`);
    }
  }

  return definitions;
}

function buildScenarios(documents: LexiconDocuments, problems: string[]): Scenario[] {
  const scenarioIds = new Set<string>();
  const stepIds = new Set<string>();
  const scenarios: Scenario[] = [];

  for (const document of documents.knowledgeBase) {
    for (const scenario of document.scenarios) {
      if (scenarioIds.has(scenario.id)) {
        problems.push(`scenario ${scenario.id} declared more than once`);
      }
      scenarioIds.add(scenario.id);

      const localIds = new Set(scenario.steps.map((step) => step.id));
      const steps: TroubleshootingStep[] = [];
      for (const step of scenario.steps) {
        if (stepIds.has(step.id)) {
          problems.push(`step ${step.id} declared more than once`);
        }
        stepIds.add(step.id);
        for (const prerequisite of step.prerequisites) {
          if (!localIds.has(prerequisite)) {
            problems.push(`step ${step.id} requires unknown step ${prerequisite}`);
          }
        }
        steps.push(
          Object.freeze({
            id: step.id,
            text: Object.freeze({ ml: step.ml, en: step.en }),
            technicalDetails: step.technicalDetails,
            complexity: step.complexity,
            estimatedSeconds: step.estimatedSeconds,
            prerequisites: Object.freeze([...step.prerequisites]),
            successCount: step.successCount,
            attemptCount: step.attemptCount,
          }),
        );
      }

      scenarios.push(
        Object.freeze({
          id: scenario.id,
          issueType: scenario.issueType,
          title: Object.freeze({ ...scenario.title }),
          keywords: Object.freeze([...scenario.keywords]),
          steps: Object.freeze(steps),
          escalation: Object.freeze({ ...scenario.escalation }),
        }),
      );
    }
  }

  return scenarios;
}

/**
 * Compile parsed documents into an immutable lexicon, checking the
 * cross-table rules that keep enhancement idempotent
 */
export function buildLexicon(documents: LexiconDocuments): Lexicon {
  const problems: string[] = [];

  const romanization = createPhraseTable(Object.entries(documents.romanization.entries));
  const codeSwitch = createPhraseTable(Object.entries(documents.codeSwitch.entries));
  const ngrams = createPhraseTable(Object.entries(documents.ngrams.entries));
  const technicalTerms = buildTechnicalTerms(documents.technicalTerms, problems);
  const errorPatterns = compileErrorPatterns(documents.errorPatterns, problems);

  const ngramTargets = Object.values(documents.ngrams.entries);
  const canonicalTerms = documents.technicalTerms.groups.map((group) => group.canonical);
  const corpusTexts = documents.commonPhrases.entries.map((entry) => entry.text);

  checkFixpoints('n-gram target', ngramTargets, [ngrams], problems);
  checkFixpoints('technical term', canonicalTerms, [ngrams, technicalTerms], problems);
  checkFixpoints('corpus entry', corpusTexts, [ngrams, technicalTerms], problems);
  const reserved = [romanization, codeSwitch];
  checkNotReserved('n-gram target', ngramTargets, reserved, problems);
  checkNotReserved('technical term', canonicalTerms, reserved, problems);
  checkNotReserved('corpus entry', corpusTexts, reserved, problems);

  const tables: RewriteTables = { romanization, codeSwitch, errorPatterns, ngrams, technicalTerms };
  for (const [name, terms] of Object.entries(documents.domainKeywords.sets)) {
    checkEnhancedForm(`domain term (${name})`, terms, tables, problems);
  }

  const stopwords = new Set(documents.filters.stopwords.flatMap(textKeys));
  const issues = buildIssues(documents, stopwords, tables, problems);
  const scenarios = buildScenarios(documents, problems);

  if (problems.length > 0) {
    throw new LexiconLoadError(problems);
  }

  // Template references such as $1 are not words
  const replacementWords = documents.errorPatterns.patterns
    .flatMap((pattern) => splitTokens(pattern.replacement))
    .filter((token) => !token.includes('$'));

  // Fuzzy correction must leave what the classifier matches on alone
  const classifierTerms = [
    ...Object.values(documents.domainKeywords.sets).flat(),
    ...documents.issues.issues.flatMap((issue) => [
      ...issue.keywords,
      ...issue.subIssues.flatMap((subIssue) => subIssue.indicators),
    ]),
  ];

  const canonicalVocabulary = new Set(
    [
      ...Object.values(documents.romanization.entries),
      ...Object.values(documents.codeSwitch.entries),
      ...replacementWords,
      ...ngramTargets,
      ...canonicalTerms,
      ...corpusTexts,
      ...classifierTerms,
    ].flatMap(textKeys),
  );
  const technicalVocabulary = new Set(
    [...canonicalTerms, ...Object.values(documents.codeSwitch.entries)].flatMap(textKeys),
  );

  const corpus: CorpusEntry[] = documents.commonPhrases.entries.map((entry) =>
    Object.freeze({ text: entry.text, frequency: entry.frequency }),
  );

  const domainKeywords = new Map<string, readonly string[]>(
    Object.entries(documents.domainKeywords.sets).map(([name, terms]) => [name, Object.freeze([...terms])]),
  );

  return Object.freeze({
    romanization,
    codeSwitch,
    errorPatterns: Object.freeze(errorPatterns),
    ngrams,
    technicalTerms,
    corpus: Object.freeze(corpus),
    canonicalVocabulary,
    technicalVocabulary,
    silenceTerms: new Set(documents.filters.silenceTerms.flatMap(textKeys)),
    inappropriateTerms: new Set(documents.filters.inappropriateTerms.flatMap(textKeys)),
    stopwords,
    domainKeywords,
    issues: Object.freeze(issues),
    escalationKeywords: Object.freeze([...documents.escalation.keywords]),
    scenarios: Object.freeze(scenarios),
    loadedAt: new Date(),
  });
}

export function loadLexicon(dataDir: string): Lexicon {
  return buildLexicon(readLexiconDocuments(dataDir));
}
