import { createPhraseTable, rewritePhrases, rewriteText } from './phrase-rewriter';

describe('phrase rewriter', () => {
  const table = createPhraseTable([
    ['wifi varunnilla', 'വൈഫൈ പ്രവർത്തിക്കുന്നില്ല'],
    ['wifi', 'വൈഫൈ'],
    ['net', 'ഇന്റർനെറ്റ്'],
  ]);

  it('should record the longest phrase length', () => {
    expect(table.maxLength).toBe(2);
  });

  it('should prefer the longest match', () => {
    expect(rewriteText('wifi varunnilla', table)).toBe('വൈഫൈ പ്രവർത്തിക്കുന്നില്ല');
  });

  it('should fall back to single words', () => {
    expect(rewriteText('net and wifi', table)).toBe('ഇന്റർനെറ്റ് and വൈഫൈ');
  });

  it('should match case-insensitively and keep outer punctuation', () => {
    expect(rewritePhrases(['(Wifi', 'varunnilla).'], table)).toEqual(['(വൈഫൈ', 'പ്രവർത്തിക്കുന്നില്ല).']);
  });

  it('should not match a phrase across inner punctuation', () => {
    expect(rewritePhrases(['wifi,', 'varunnilla'], table)).toEqual(['വൈഫൈ,', 'varunnilla']);
  });

  it('should leave unknown tokens untouched', () => {
    expect(rewriteText('router restart', table)).toBe('router restart');
  });
});
