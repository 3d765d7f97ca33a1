import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IssueType } from '../interfaces';
import { LexiconDocuments } from './lexicon.schema';
import { LexiconLoadError, buildLexicon, loadLexicon, readLexiconDocuments } from './lexicon-loader';

const DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

function problemsFrom(action: () => unknown): string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof LexiconLoadError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

function problemsOf(documents: LexiconDocuments): string[] {
  return problemsFrom(() => buildLexicon(documents));
}

describe('lexicon loader', () => {
  let pristine: LexiconDocuments;

  beforeAll(() => {
    pristine = readLexiconDocuments(DATA_DIR);
  });

  function documents(): LexiconDocuments {
    return structuredClone(pristine);
  }

  describe('loadLexicon', () => {
    it('should load the bundled tables', () => {
      const lexicon = loadLexicon(DATA_DIR);

      expect(lexicon.issues.map((issue) => issue.type)).toEqual([
        IssueType.FIBER_CUT,
        IssueType.INTERNET_DOWN,
        IssueType.SLOW_INTERNET,
        IssueType.WIFI_ISSUE,
        IssueType.POWER_ISSUE,
        IssueType.TV_ISSUE,
        IssueType.BILLING_ISSUE,
      ]);
      expect(lexicon.romanization.maxLength).toBe(3);
      expect(lexicon.scenarios.find((scenario) => scenario.id === 'fiber-cut')?.escalation.autoEscalate).toBe(true);
    });

    it('should freeze the compiled lexicon', () => {
      const lexicon = loadLexicon(DATA_DIR);

      expect(Object.isFrozen(lexicon)).toBe(true);
      expect(Object.isFrozen(lexicon.issues)).toBe(true);
      expect(Object.isFrozen(lexicon.scenarios[0].steps[0])).toBe(true);
    });

    it('should order issue keywords longest first', () => {
      const fiber = loadLexicon(DATA_DIR).issues[0];

      expect(fiber.keywords).toEqual([
        'കേബിൾ മുറിഞ്ഞു',
        'ഫൈബർ കട്ട്',
        'കേബിൾ പോയി',
        'കേബിൾ cut',
        'ഫൈബർ cut',
        'ഫൈബർ',
        'los',
      ]);
    });

    it('should keep literal replacement words but not template references', () => {
      const lexicon = loadLexicon(DATA_DIR);

      expect(lexicon.canonicalVocabulary.has('mbps')).toBe(true);
      expect(lexicon.canonicalVocabulary.has('$1')).toBe(false);
    });

    it('should leave stopwords out of issue vocabulary', () => {
      const wifi = loadLexicon(DATA_DIR).issues[3];

      expect(wifi.vocabulary.has('unstable')).toBe(true);
      expect(wifi.vocabulary.has('not')).toBe(false);
      expect(wifi.vocabulary.has('or')).toBe(false);
    });

    it('should build issue vocabulary from enhanced descriptions', () => {
      const wifi = loadLexicon(DATA_DIR).issues[3];

      expect(wifi.vocabulary.has('വൈഫൈ')).toBe(true);
      expect(wifi.vocabulary.has('നെറ്റ്\u200Cവർക്ക്')).toBe(true);
      expect(wifi.vocabulary.has('wireless')).toBe(false);
      expect(wifi.vocabulary.has('network')).toBe(false);
    });

    it('should keep classifier terms out of fuzzy correction', () => {
      const lexicon = loadLexicon(DATA_DIR);

      expect(lexicon.canonicalVocabulary.has('down')).toBe(true);
      expect(lexicon.canonicalVocabulary.has('reflected')).toBe(true);
      expect(lexicon.canonicalVocabulary.has('los')).toBe(true);
    });
  });

  describe('readLexiconDocuments', () => {
    let emptyDir: string;

    beforeEach(() => {
      emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexicon-'));
    });

    afterEach(() => {
      fs.rmSync(emptyDir, { recursive: true, force: true });
    });

    it('should report every missing table at once', () => {
      const problems = problemsFrom(() => readLexiconDocuments(emptyDir));

      // ten lexicon tables plus the knowledge base directory
      expect(problems).toHaveLength(11);
      expect(problems[0]).toContain('romanization.json');
    });

    it('should report schema violations with their path', () => {
      fs.cpSync(DATA_DIR, emptyDir, { recursive: true });
      fs.writeFileSync(path.join(emptyDir, 'lexicon', 'escalation.json'), JSON.stringify({ keywords: [] }));

      expect(problemsFrom(() => readLexiconDocuments(emptyDir))).toEqual([
        `${path.join(emptyDir, 'lexicon', 'escalation.json')}: keywords: Array must contain at least 1 element(s)`,
      ]);
    });
  });

  describe('buildLexicon', () => {
    it('should accept the bundled documents', () => {
      expect(problemsOf(documents())).toEqual([]);
    });

    it('should reject an n-gram target that another n-gram rewrites', () => {
      const input = documents();
      input.ngrams.entries['കണക്ഷൻ പോയി'] = 'നെറ്റ് പോയി';

      expect(problemsOf(input)).toEqual(['n-gram target "നെറ്റ് പോയി" would be rewritten again']);
    });

    it('should reject a variant claimed by two canonical terms', () => {
      const input = documents();
      input.technicalTerms.groups.push({ canonical: 'മോഡം', variants: ['റൂട്ടർ'] });

      expect(problemsOf(input)).toEqual(['technical term "റൂട്ടർ" maps to both "റൗട്ടർ" and "മോഡം"']);
    });

    it('should reject a corpus entry that code-switching would rewrite', () => {
      const input = documents();
      input.commonPhrases.entries.push({ text: 'wifi', frequency: 1 });

      expect(problemsOf(input)).toEqual([
        'corpus entry "wifi" contains "wifi", which romanization or code-switch rewrites',
      ]);
    });

    it('should reject an error pattern that misses its example', () => {
      const input = documents();
      input.errorPatterns.patterns.push({ id: 'broken', regex: 'xyz', replacement: 'abc', example: 'nothing here' });

      expect(problemsOf(input)).toEqual(['error pattern broken: does not match its own example']);
    });

    it('should reject an error pattern whose output triggers it again', () => {
      const input = documents();
      input.errorPatterns.patterns.push({ id: 'doubling', regex: 'zz', replacement: 'zzz', example: 'zz' });

      expect(problemsOf(input)).toEqual(['error pattern doubling: replacement is matched again by its trigger']);
    });

    it('should reject an issue keyword that the rewrite tables would change', () => {
      const input = documents();
      input.issues.issues[1].keywords.push('no internet');

      expect(problemsOf(input)).toEqual([
        'internet_down keyword "no internet" would be rewritten to "no ഇന്റർനെറ്റ്"',
      ]);
    });

    it('should reject sub-issue indicators and domain terms outside their enhanced form', () => {
      const input = documents();
      input.issues.issues[3].subIssues[0].indicators.push('password');
      input.domainKeywords.sets.tv.push('channel', 'set top box');

      expect(problemsOf(input)).toEqual([
        'domain term (tv) "channel" would be rewritten to "ചാനൽ"',
        'domain term (tv) "set top box" would be rewritten to "സെറ്റ് ടോപ്പ് ബോക്സ്"',
        'wifi_issue/password indicator "password" would be rewritten to "പാസ്\u200Cവേഡ്"',
      ]);
    });

    it('should require an entry for every issue type', () => {
      const input = documents();
      input.issues.issues = input.issues.issues.filter((issue) => issue.type !== IssueType.BILLING_ISSUE);

      expect(problemsOf(input)).toEqual(['issue type billing_issue has no registry entry']);
    });

    it('should reject unknown domain sets', () => {
      const input = documents();
      input.issues.issues[0].domainSets.push('weather');

      expect(problemsOf(input)).toEqual(['issue type fiber_cut references unknown domain set "weather"']);
    });

    it('should reject prerequisites outside the scenario', () => {
      const input = documents();
      input.knowledgeBase[0].scenarios[0].steps[0].prerequisites.push('missing-step');

      expect(problemsOf(input)).toEqual(['step fiber-check-los requires unknown step missing-step']);
    });
  });
});
