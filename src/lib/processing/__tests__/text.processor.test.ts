/**
 * Text Processor Tests
 * Unit tests for TextProcessor and its helpers
 */

import { cleanText, countWords, TextProcessor } from '../text.processor';

describe('TextProcessor', () => {
  let textProcessor: TextProcessor;

  beforeEach(() => {
    textProcessor = new TextProcessor();
  });

  describe('process', () => {
    it('should drop boilerplate lines and blank runs', () => {
      const text = 'Home\n\n\n\nWelcome to Example\nMenu\n';
      const result = textProcessor.process(text);

      expect(result.text).toBe('Welcome to Example');
      expect(result.originalLength).toBe(text.length);
      expect(result.processedLength).toBe(18);
      expect(result.metadata).toEqual({ keptLines: 1, removedLines: 6 });
    });

    it('should drop lines shorter than four characters', () => {
      const result = textProcessor.process('OK\nYes\nSure thing\n»');

      expect(result.text).toBe('Sure thing');
    });

    it('should match boilerplate case-insensitively after trimming', () => {
      const result = textProcessor.process('  SKIP  \nMENU\nReal content here');

      expect(result.text).toBe('Real content here');
    });

    it('should keep lines that only contain a boilerplate word', () => {
      const result = textProcessor.process('Home improvement tips\nMenu of the day');

      expect(result.text).toBe('Home improvement tips\nMenu of the day');
    });

    it('should trim every kept line', () => {
      const result = textProcessor.process('   First line   \n\tSecond line\t');

      expect(result.text).toBe('First line\nSecond line');
    });

    it('should handle empty text', () => {
      const result = textProcessor.process('');

      expect(result.text).toBe('');
      expect(result.originalLength).toBe(0);
      expect(result.processedLength).toBe(0);
    });

    it('should handle whitespace-only text', () => {
      const result = textProcessor.process('   \n\t  ');

      expect(result.text).toBe('');
      expect(result.originalLength).toBe(7);
    });

    it('should return empty text when every line is noise', () => {
      expect(textProcessor.process('Home\nMenu\nSkip\nx').text).toBe('');
    });

    it('should count line length in characters, not UTF-16 units', () => {
      expect(textProcessor.process('\u{1F600}\u{1F600}').text).toBe('');
      expect(textProcessor.process('\u{1F600}\u{1F600}\u{1F600}\u{1F600}').text).toBe(
        '\u{1F600}\u{1F600}\u{1F600}\u{1F600}'
      );
    });
  });
});

describe('cleanText', () => {
  it('should use the default processor', () => {
    expect(cleanText('Menu\nOur services\n\n\nAbout us')).toBe('Our services\nAbout us');
  });
});

describe('countWords', () => {
  it('should count whitespace-delimited tokens', () => {
    expect(countWords('Welcome to Example')).toBe(3);
    expect(countWords('  spaced\tout\n\nwords  ')).toBe(3);
  });

  it('should return zero for blank text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords(' \n ')).toBe(0);
  });
});
