/**
 * Lexicon validation script
 *
 * Loads every table under the data directory with the same checks the
 * services run at startup, and prints a summary.
 * Run: npm run build && npm run validate-lexicon [dataDir]
 */

import { getCoreConfig } from '../config/core.config';
import { IssueType } from '../interfaces';
import { LexiconLoadError, loadLexicon } from '../lexicon/lexicon-loader';

function validateLexicon(dataDir: string): void {
  console.log(`[Lexicon] Validating tables in ${dataDir}...`);

  const lexicon = loadLexicon(dataDir);

  console.log(`[Lexicon] Romanized phrases: ${lexicon.romanization.entries.size}`);
  console.log(`[Lexicon] Code-switch terms: ${lexicon.codeSwitch.entries.size}`);
  console.log(`[Lexicon] Error patterns: ${lexicon.errorPatterns.length}`);
  console.log(`[Lexicon] N-gram corrections: ${lexicon.ngrams.entries.size}`);
  console.log(`[Lexicon] Technical term variants: ${lexicon.technicalTerms.entries.size}`);
  console.log(`[Lexicon] Corpus entries: ${lexicon.corpus.length}`);

  const stepsByIssue: Record<string, number> = {};
  for (const scenario of lexicon.scenarios) {
    stepsByIssue[scenario.issueType] = (stepsByIssue[scenario.issueType] || 0) + scenario.steps.length;
  }

  console.log('\n[Lexicon] Troubleshooting steps by issue type:');
  for (const issue of lexicon.issues) {
    console.log(`  - ${issue.type}: ${stepsByIssue[issue.type] || 0} steps`);
  }

  const uncovered = Object.values(IssueType).filter(
    (type) => type !== IssueType.UNCLASSIFIED && !stepsByIssue[type],
  );
  if (uncovered.length > 0) {
    console.warn(`[Lexicon] Issue types without steps: ${uncovered.join(', ')}`);
  }

  console.log('\n[Lexicon] All tables valid');
}

try {
  validateLexicon(process.argv[2] || getCoreConfig().dataDir);
} catch (error) {
  if (error instanceof LexiconLoadError) {
    console.error(`[Lexicon] ${error.problems.length} problem(s) found:`);
    for (const problem of error.problems) {
      console.error(`  - ${problem}`);
    }
  } else {
    console.error('[Lexicon] Validation failed:', error);
  }
  process.exit(1);
}
