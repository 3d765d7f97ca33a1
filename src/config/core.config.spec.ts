import * as path from 'path';
import { getCoreConfig, loadCoreConfig, resetCoreConfig, validateCoreConfig } from './core.config';

describe('core config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    resetCoreConfig();
  });

  afterAll(() => {
    process.env = originalEnv;
    resetCoreConfig();
  });

  describe('loadCoreConfig', () => {
    it('should use defaults when environment is empty', () => {
      const config = loadCoreConfig();

      expect(config.dataDir).toBe(path.resolve(__dirname, '..', '..', 'data'));
      expect(config.silenceAudioThreshold).toBe(100);
      expect(config.fuzzy.corpusThreshold).toBe(0.8);
      expect(config.fuzzy.contextThreshold).toBe(0.85);
      expect(config.classifier.minConfidence).toBe(0.5);
      expect(config.classifier.historyTurns).toBe(3);
      expect(config.prioritizer.emaAlpha).toBe(0.1);
      expect(config.prioritizer.successPrior).toBe(0.5);
    });

    it('should read overrides from environment', () => {
      process.env.FUZZY_CORPUS_THRESHOLD = '0.7';
      process.env.STEP_EMA_ALPHA = '0.25';
      process.env.SUPPORT_CORE_DATA_DIR = '/srv/lexicon';

      const config = loadCoreConfig();

      expect(config.fuzzy.corpusThreshold).toBe(0.7);
      expect(config.prioritizer.emaAlpha).toBe(0.25);
      expect(config.dataDir).toBe('/srv/lexicon');
    });
  });

  describe('validateCoreConfig', () => {
    it('should accept the defaults', () => {
      expect(validateCoreConfig(loadCoreConfig())).toEqual([]);
    });

    it('should reject thresholds outside [0, 1]', () => {
      process.env.FUZZY_CONTEXT_THRESHOLD = '1.5';

      const errors = validateCoreConfig(loadCoreConfig());

      expect(errors).toEqual(['fuzzy.contextThreshold must be between 0 and 1, got 1.5']);
    });

    it('should reject non-numeric values', () => {
      process.env.CLASSIFIER_HISTORY_TURNS = 'three';

      const errors = validateCoreConfig(loadCoreConfig());

      expect(errors).toEqual(['classifier.historyTurns must be a positive number, got NaN']);
    });

    it('should reject weights that do not sum to 1', () => {
      process.env.STEP_WEIGHT_SUCCESS = '0.6';

      const errors = validateCoreConfig(loadCoreConfig());

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^prioritizer weights must sum to 1/);
    });

    it('should reject an alpha of 0 or 1', () => {
      process.env.STEP_EMA_ALPHA = '1';

      expect(validateCoreConfig(loadCoreConfig())).toEqual([
        'prioritizer.emaAlpha must be strictly between 0 and 1, got 1',
      ]);
    });
  });

  describe('getCoreConfig', () => {
    it('should cache until reset', () => {
      const first = getCoreConfig();
      expect(getCoreConfig()).toBe(first);

      resetCoreConfig();
      expect(getCoreConfig()).not.toBe(first);
    });
  });
});
