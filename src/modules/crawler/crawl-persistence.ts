/**
 * Crawl Persistence
 * Writes the record set read by the chunking pipeline, plus a readable summary
 */

import * as fs from 'fs';
import * as path from 'path';
import type { PageRecord, PersistedArtifacts } from '../../lib/crawling/crawling.types';
import type { PersistenceSink } from './crawl-orchestrator';

export const DATA_FILE_NAME = 'scraped_data.json';
export const SUMMARY_FILE_NAME = 'scraping_summary.txt';

/**
 * On-disk shape of a page record
 */
export interface SerializedPageRecord {
  url: string;
  title: string;
  content: string;
  headings: string[];
  meta_description: string;
  scraped_at: number;
  word_count: number;
}

export function serializePageRecord(record: PageRecord): SerializedPageRecord {
  return {
    url: record.url,
    title: record.title,
    content: record.content,
    headings: [...record.headings],
    meta_description: record.metaDescription,
    scraped_at: record.scrapedAt,
    word_count: record.wordCount,
  };
}

export function isSerializedPageRecord(value: unknown): value is SerializedPageRecord {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.url === 'string' &&
    typeof candidate.title === 'string' &&
    typeof candidate.content === 'string' &&
    Array.isArray(candidate.headings) &&
    candidate.headings.every((heading) => typeof heading === 'string') &&
    typeof candidate.meta_description === 'string' &&
    typeof candidate.scraped_at === 'number' &&
    typeof candidate.word_count === 'number'
  );
}

/**
 * Human-readable summary: base URL, page count, numbered url - title lines
 */
export function formatSummary(baseUrl: string, records: readonly PageRecord[]): string {
  const lines = [
    'Web Scraping Summary',
    '===================',
    '',
    `Base URL: ${baseUrl}`,
    `Total pages scraped: ${records.length}`,
    'Scraped URLs:',
    ...records.map((record, index) => `${index + 1}. ${record.url} - ${record.title}`),
  ];
  return `${lines.join('\n')}\n`;
}

export class FilePersistenceSink implements PersistenceSink {
  constructor(private readonly dataDir: string) {}

  get dataFile(): string {
    return path.join(this.dataDir, DATA_FILE_NAME);
  }

  get summaryFile(): string {
    return path.join(this.dataDir, SUMMARY_FILE_NAME);
  }

  async persist(baseUrl: string, records: readonly PageRecord[]): Promise<PersistedArtifacts> {
    await fs.promises.mkdir(this.dataDir, { recursive: true });

    const serialized = records.map(serializePageRecord);
    await fs.promises.writeFile(this.dataFile, JSON.stringify(serialized, null, 2), 'utf-8');
    console.log(`[Crawler] Scraped data saved to ${this.dataFile}`);

    await fs.promises.writeFile(this.summaryFile, formatSummary(baseUrl, records), 'utf-8');
    console.log(`[Crawler] Summary saved to ${this.summaryFile}`);

    return { dataFile: this.dataFile, summaryFile: this.summaryFile };
  }

  /**
   * Read back a persisted record set
   */
  async load(): Promise<SerializedPageRecord[]> {
    const raw = await fs.promises.readFile(this.dataFile, 'utf-8');
    const parsed: unknown = JSON.parse(raw);

    if (!Array.isArray(parsed) || !parsed.every(isSerializedPageRecord)) {
      throw new Error(`${this.dataFile} does not contain a page record list`);
    }
    return parsed;
  }
}
