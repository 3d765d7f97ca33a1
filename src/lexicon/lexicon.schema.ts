import { z } from 'zod';
import { IssueType } from '../interfaces';

const text = z
  .string()
  .min(1)
  .transform((value) => value.normalize('NFC'));

const replacement = z.string().transform((value) => value.normalize('NFC'));

const identifier = z.string().regex(/^[a-z0-9_-]+$/, 'must be lowercase letters, digits, - or _');

const localized = z.object({ ml: text, en: text });

const classifiedIssueType = z
  .nativeEnum(IssueType)
  .refine((value) => value !== IssueType.UNCLASSIFIED, 'unclassified cannot be declared');

export const phraseTableSchema = z.object({
  entries: z.record(text).refine((entries) => Object.keys(entries).length > 0, 'must not be empty'),
});

export const errorPatternsSchema = z.object({
  patterns: z.array(
    z.union([
      z.object({
        id: identifier,
        literal: text,
        replacement,
      }),
      z.object({
        id: identifier,
        regex: z.string().min(1),
        flags: z.string().regex(/^[ims]*$/).optional(),
        replacement,
        example: text,
      }),
    ]),
  ),
});

export const technicalTermsSchema = z.object({
  groups: z.array(
    z.object({
      canonical: text,
      variants: z.array(text).min(1),
    }),
  ),
});

export const commonPhrasesSchema = z.object({
  entries: z
    .array(
      z.object({
        text,
        frequency: z.number().int().positive(),
      }),
    )
    .min(1),
});

export const filtersSchema = z.object({
  silenceTerms: z.array(text).min(1),
  inappropriateTerms: z.array(text),
  stopwords: z.array(text),
});

export const domainKeywordsSchema = z.object({
  sets: z.record(z.array(text).min(1)),
});

export const issuesSchema = z.object({
  issues: z
    .array(
      z.object({
        type: classifiedIssueType,
        keywords: z.array(text).min(1),
        domainSets: z.array(identifier),
        description: localized,
        subIssues: z.array(
          z.object({
            id: identifier,
            indicators: z.array(text).min(1),
          }),
        ),
      }),
    )
    .min(1),
});

export const escalationSchema = z.object({
  keywords: z.array(text).min(1),
});

const stepSchema = z
  .object({
    id: identifier,
    ml: text,
    en: text,
    technicalDetails: z.string(),
    complexity: z.number().int().min(1).max(4),
    estimatedSeconds: z.number().positive(),
    prerequisites: z.array(identifier),
    successCount: z.number().nonnegative().default(0),
    attemptCount: z.number().nonnegative().default(0),
  })
  .refine((step) => step.successCount <= step.attemptCount, {
    message: 'successCount cannot exceed attemptCount',
    path: ['successCount'],
  });

export const knowledgeBaseSchema = z.object({
  scenarios: z.array(
    z.object({
      id: identifier,
      issueType: classifiedIssueType,
      title: localized,
      keywords: z.array(text),
      steps: z.array(stepSchema).min(1),
      escalation: z.object({
        condition: z.string(),
        priority: z.enum(['high', 'medium', 'low']),
        autoEscalate: z.boolean().default(false),
      }),
    }),
  ),
});

export type PhraseTableDocument = z.infer<typeof phraseTableSchema>;
export type ErrorPatternsDocument = z.infer<typeof errorPatternsSchema>;
export type TechnicalTermsDocument = z.infer<typeof technicalTermsSchema>;
export type CommonPhrasesDocument = z.infer<typeof commonPhrasesSchema>;
export type FiltersDocument = z.infer<typeof filtersSchema>;
export type DomainKeywordsDocument = z.infer<typeof domainKeywordsSchema>;
export type IssuesDocument = z.infer<typeof issuesSchema>;
export type EscalationDocument = z.infer<typeof escalationSchema>;
export type KnowledgeBaseDocument = z.infer<typeof knowledgeBaseSchema>;

/**
 * Every parsed document the lexicon is built from
 */
export interface LexiconDocuments {
  romanization: PhraseTableDocument;
  codeSwitch: PhraseTableDocument;
  errorPatterns: ErrorPatternsDocument;
  ngrams: PhraseTableDocument;
  technicalTerms: TechnicalTermsDocument;
  commonPhrases: CommonPhrasesDocument;
  filters: FiltersDocument;
  domainKeywords: DomainKeywordsDocument;
  issues: IssuesDocument;
  escalation: EscalationDocument;
  knowledgeBase: KnowledgeBaseDocument[];
}
