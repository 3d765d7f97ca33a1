import * as path from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { CORE_CONFIG, loadCoreConfig } from '../config/core.config';
import { ConversationTurn, SpeakerRole } from '../interfaces';
import { buildLexicon, readLexiconDocuments } from '../lexicon/lexicon-loader';
import { LexiconRegistryService } from './lexicon-registry.service';
import { EnhancementStage, TranscriptEnhancerService } from './transcript-enhancer.service';

function turn(text: string, role: SpeakerRole = 'customer'): ConversationTurn {
  return { role, text, timestamp: new Date('2024-01-01T10:00:00Z') };
}

describe('TranscriptEnhancerService', () => {
  let service: TranscriptEnhancerService;
  let registry: LexiconRegistryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: CORE_CONFIG, useValue: loadCoreConfig() },
        LexiconRegistryService,
        TranscriptEnhancerService,
      ],
    }).compile();

    service = module.get<TranscriptEnhancerService>(TranscriptEnhancerService);
    registry = module.get<LexiconRegistryService>(LexiconRegistryService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('romanization and code-switching', () => {
    it('should transliterate romanized Malayalam', () => {
      expect(service.enhance('njan ente veetil wifi varunnilla ennu paranju')).toBe(
        'ഞാൻ എന്റെ വീട്ടിൽ വൈഫൈ പ്രവർത്തിക്കുന്നില്ല എന്ന് പറഞ്ഞു',
      );
    });

    it('should map English roots inside Malayalam words', () => {
      expect(service.enhance('എന്റെ wifiയിൽ signal ഇല്ല')).toBe('എന്റെ വൈഫൈയിൽ സിഗ്നൽ ഇല്ല');
    });

    it('should leave unmapped English words alone', () => {
      expect(service.enhance('my connection is slow')).toBe('my കണക്ഷൻ is സ്ലോ');
    });
  });

  describe('script and error patterns', () => {
    it('should repair known misspellings', () => {
      expect(service.enhance('മോഡെം ഓഫ് ആണ്')).toBe('മോഡം ഓഫ് ആണ്');
    });

    it('should normalise speed units', () => {
      expect(service.enhance('speed 50 എംബിപിഎസ്')).toBe('സ്പീഡ് 50 mbps');
    });

    it('should strip control characters and repeated punctuation', () => {
      expect(service.enhance('വൈഫൈ\u0007 വരുന്നില്ല!!')).toBe('വൈഫൈ പ്രവർത്തിക്കുന്നില്ല!');
    });

    it('should convert legacy chillu encodings', () => {
      expect(service.enhance('കണക്ഷന്\u200D')).toBe('കണക്ഷൻ');
    });
  });

  describe('n-grams and technical terms', () => {
    it('should rewrite colloquial phrases', () => {
      expect(service.enhance('നെറ്റ് വരുന്നില്ല')).toBe('ഇന്റർനെറ്റ് വരുന്നില്ല');
      expect(service.enhance('ഡാറ്റ കഴിഞ്ഞു')).toBe('ഡാറ്റ തീർന്നു');
    });

    it('should canonicalise technical term variants', () => {
      expect(service.enhance('റൂട്ടർ ഓൺ ആണ്')).toBe('റൗട്ടർ ഓൺ ആണ്');
      expect(service.enhance('wi-fi password')).toBe('വൈഫൈ പാസ്\u200Cവേഡ്');
    });
  });

  describe('fuzzy correction', () => {
    it('should correct near misses from the corpus', () => {
      expect(service.enhance('കണക്ശൻ ഇല്ല')).toBe('കണക്ഷൻ ഇല്ല');
      expect(service.enhance('blinkinh')).toBe('blinking');
    });

    it('should leave short tokens and numbers alone', () => {
      expect(service.enhance('ok 5g')).toBe('ok 5g');
    });

    it('should rank candidates by similarity', () => {
      const candidates = service.findCandidates('blinkinh', 0.8);

      expect(candidates[0].text).toBe('blinking');
      expect(candidates[0].similarity).toBeCloseTo(0.875, 5);
    });

    it('should not grow a word into a longer corpus entry', () => {
      expect(service.findCandidates('linking', 0.8)).toEqual([]);
      expect(service.enhance('linking')).toBe('linking');
    });
  });

  describe('fuzzy correction with a lower threshold', () => {
    let lenient: TranscriptEnhancerService;

    beforeEach(async () => {
      const config = loadCoreConfig();
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          { provide: CORE_CONFIG, useValue: { ...config, fuzzy: { ...config.fuzzy, corpusThreshold: 0.7 } } },
          LexiconRegistryService,
          TranscriptEnhancerService,
        ],
      }).compile();

      lenient = module.get<TranscriptEnhancerService>(TranscriptEnhancerService);
    });

    it('should keep affirmative verbs instead of turning them negative', () => {
      expect(lenient.enhance('പ്രവർത്തിക്കുന്നു')).toBe('പ്രവർത്തിക്കുന്നു');
      expect(lenient.enhance('വൈഫൈ varunnu')).toBe('വൈഫൈ വരുന്നു');
    });

    it('should prefer the affirmative form for a near miss of it', () => {
      const candidates = lenient.findCandidates('പ്രവർത്തിക്കുന്നൂ', 0.7);

      expect(candidates.map((candidate) => candidate.text)).toEqual([
        'പ്രവർത്തിക്കുന്നു',
        'പ്രവർത്തിക്കുന്നില്ല',
      ]);
    });

    it('should not grow a word into a longer corpus entry', () => {
      expect(lenient.enhance('linking')).toBe('linking');
    });
  });

  describe('context correction', () => {
    beforeEach(() => {
      const documents = readLexiconDocuments(path.resolve(__dirname, '..', '..', 'data'));
      documents.commonPhrases.entries.push({ text: 'faster', frequency: 5 }, { text: 'foster', frequency: 9 });
      registry.swap(buildLexicon(documents));
    });

    it('should break corpus ties by frequency without history', () => {
      expect(service.enhance('fuster')).toBe('foster');
    });

    it('should break corpus ties with a term from recent history', () => {
      expect(service.enhance('fuster', [turn('it was faster yesterday')])).toBe('faster');
    });

    it('should repair a technical term mentioned earlier in the call', () => {
      expect(service.enhance('splittar')).toBe('splittar');
      expect(service.enhance('splittar', [turn('the splitter is loose', 'agent')])).toBe('splitter');
    });

    it('should ignore history beyond the configured window', () => {
      const history = [
        turn('the splitter is loose', 'agent'),
        turn('okay'),
        turn('one moment'),
        turn('done'),
      ];

      expect(service.enhance('splittar', history)).toBe('splittar');
    });
  });

  describe('idempotence', () => {
    it('should not change text it already produced', () => {
      const inputs = [
        'njan ente veetil wifi varunnilla ennu paranju',
        'speed 50 എംബിപിഎസ്',
        'wi-fi password',
        'നെറ്റ് വരുന്നില്ല',
        'red light kathunnu',
      ];

      for (const input of inputs) {
        const once = service.enhance(input);
        expect(service.enhance(once)).toBe(once);
      }
    });

    it('should return the same text for repeated calls', () => {
      const history = [turn('the splitter is loose', 'agent')];
      const first = service.enhance('njan ente veetil wifi varunnilla, blinkinh', history);

      for (let attempt = 0; attempt < 5; attempt++) {
        expect(service.enhance('njan ente veetil wifi varunnilla, blinkinh', history)).toBe(first);
      }
      expect(first).toBe('ഞാൻ എന്റെ വീട്ടിൽ വൈഫൈ പ്രവർത്തിക്കുന്നില്ല, blinking');
    });

    it('should leave romanization output unchanged', () => {
      const targets = [...registry.current().romanization.entries.values()];

      for (const target of targets) {
        expect(service.enhance(target)).toBe(target);
      }
    });
  });

  describe('enhanceWithTrace', () => {
    it('should report stages in order with their effect', () => {
      const result = service.enhanceWithTrace('wi-fi password');

      expect(result.text).toBe('വൈഫൈ പാസ്\u200Cവേഡ്');
      expect(result.stages.map((trace) => trace.stage)).toEqual([
        EnhancementStage.ROMANIZATION,
        EnhancementStage.CODE_SWITCH,
        EnhancementStage.SCRIPT,
        EnhancementStage.ERROR_PATTERNS,
        EnhancementStage.NGRAMS,
        EnhancementStage.TECHNICAL_TERMS,
        EnhancementStage.FUZZY,
        EnhancementStage.CONTEXT,
        EnhancementStage.WHITESPACE,
      ]);
      expect(result.stages.filter((trace) => trace.changed).map((trace) => trace.stage)).toEqual([
        EnhancementStage.CODE_SWITCH,
        EnhancementStage.TECHNICAL_TERMS,
      ]);
    });

    it('should return no stages for empty input', () => {
      expect(service.enhanceWithTrace('   ')).toEqual({ text: '', stages: [] });
    });
  });
});
