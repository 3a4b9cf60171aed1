import { describe, it, expect } from 'vitest';
import { normalize } from '../../src/pipeline/normalizer.js';

describe('normalize', () => {
  describe('basic cleaning', () => {
    it('should keep ordinary text unchanged', () => {
      expect(normalize('Bula vinaka vei kemuni!')).toBe('Bula vinaka vei kemuni!');
    });

    it('should collapse and trim whitespace', () => {
      expect(normalize('  Bula   vinaka  ')).toBe('Bula vinaka');
      expect(normalize('Bula\tvinaka\nvei\r\nkemuni')).toBe('Bula vinaka vei kemuni');
    });

    it('should keep the punctuation allow-list', () => {
      const text = "Io, (sega)? kemuni; e: 'dua'! vaka-levu.";
      expect(normalize(text)).toBe(text);
    });

    it('should keep letters with diacritics, digits and underscores', () => {
      expect(normalize('Ōtaki ē word_1 2024')).toBe('Ōtaki ē word_1 2024');
    });
  });

  describe('markup removal', () => {
    it('should strip HTML tags', () => {
      expect(normalize('<p>Bula vinaka</p>')).toBe('Bula vinaka');
    });

    it('should strip tags with attributes', () => {
      expect(normalize('<a href="/x">Na vanua</a> levu')).toBe('Na vanua levu');
    });

    it('should treat a bracketed phrase as a tag', () => {
      expect(normalize('a <b>c</b> d < e > f')).toBe('a c d f');
    });

    it('should drop a lone angle bracket as punctuation', () => {
      expect(normalize('x <unclosed')).toBe('x unclosed');
    });
  });

  describe('disallowed characters', () => {
    it('should remove symbols', () => {
      expect(normalize('Bula★vinaka')).toBe('Bulavinaka');
      expect(normalize('50% off #sale')).toBe('50 off sale');
    });

    it('should not leave a double space where a symbol was removed', () => {
      expect(normalize('Bula @ vinaka')).toBe('Bula vinaka');
      expect(normalize('Bula & @ vinaka')).toBe('Bula vinaka');
    });
  });

  describe('non-string input', () => {
    it('should return an empty string', () => {
      expect(normalize('')).toBe('');
      expect(normalize(null)).toBe('');
      expect(normalize(undefined)).toBe('');
      expect(normalize(42)).toBe('');
      expect(normalize({ text: 'bula' })).toBe('');
      expect(normalize(['bula'])).toBe('');
    });
  });

  describe('invariants', () => {
    const samples = [
      'Bula vinaka vei kemuni!',
      '  <div>Na   noda</div> vanua & @ e vinaka ',
      'tab\there\nnewline',
      'x <unclosed > and <<b>p>',
      '★ ☆ ✦',
      '',
      '   ',
    ];

    it('should be idempotent', () => {
      for (const sample of samples) {
        const once = normalize(sample);
        expect(normalize(once)).toBe(once);
      }
    });

    it('should never leave a tag, a whitespace run, or untrimmed edges', () => {
      for (const sample of samples) {
        const result = normalize(sample);
        expect(result).not.toMatch(/<[^>]+>/);
        expect(result).not.toMatch(/\s{2,}/);
        expect(result).toBe(result.trim());
      }
    });
  });
});
