/**
 * Text Processor
 * Line-level cleanup of rendered page text
 */

export interface ProcessedText {
  text: string;
  originalLength: number;
  processedLength: number;
  metadata: {
    keptLines: number;
    removedLines: number;
  };
}

// Counted in characters (code points), not UTF-16 units
const MIN_LINE_LENGTH = 4;

// Navigation-only lines, compared case-insensitively
const BOILERPLATE_LINES = ['home', 'menu', 'skip'];

export class TextProcessor {
  /**
   * Drop short and navigation-only lines, collapse runs of blank lines, trim
   */
  process(text: string): ProcessedText {
    if (!text || text.trim().length === 0) {
      return {
        text: '',
        originalLength: text ? text.length : 0,
        processedLength: 0,
        metadata: {
          keptLines: 0,
          removedLines: 0,
        },
      };
    }

    const lines = text.split('\n');
    const kept: string[] = [];

    for (const rawLine of lines) {
      const line = rawLine.trim();
      if ([...line].length < MIN_LINE_LENGTH) continue;
      if (BOILERPLATE_LINES.includes(line.toLowerCase())) continue;
      kept.push(line);
    }

    const cleaned = this.collapseBlankLines(kept.join('\n')).trim();

    return {
      text: cleaned,
      originalLength: text.length,
      processedLength: cleaned.length,
      metadata: {
        keptLines: kept.length,
        removedLines: lines.length - kept.length,
      },
    };
  }

  /**
   * Three or more consecutive newlines become exactly one blank line
   */
  private collapseBlankLines(text: string): string {
    return text.replace(/\n{3,}/g, '\n\n');
  }
}

const defaultTextProcessor = new TextProcessor();

export function cleanText(text: string): string {
  return defaultTextProcessor.process(text).text;
}

/**
 * Whitespace-delimited token count
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}
