/**
 * Crawl Persistence Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pageRecord } from '../../../__tests__/helpers/fixtures';
import {
  DATA_FILE_NAME,
  FilePersistenceSink,
  formatSummary,
  isSerializedPageRecord,
  serializePageRecord,
  SUMMARY_FILE_NAME,
} from '../crawl-persistence';

const records = [
  pageRecord({ url: 'https://example.com/', title: 'Welcome to Example', metaDescription: 'Example home page' }),
  pageRecord({ url: 'https://example.com/about', title: '' }),
];

describe('serializePageRecord', () => {
  it('should write snake_case field names', () => {
    expect(serializePageRecord(records[0])).toEqual({
      url: 'https://example.com/',
      title: 'Welcome to Example',
      content: 'About Us\nExample was founded to make software simpler.',
      headings: ['About Us'],
      meta_description: 'Example home page',
      scraped_at: 1700000000,
      word_count: 9,
    });
  });
});

describe('isSerializedPageRecord', () => {
  it('should reject values missing fields or with wrong types', () => {
    expect(isSerializedPageRecord(serializePageRecord(records[0]))).toBe(true);
    expect(isSerializedPageRecord(null)).toBe(false);
    expect(isSerializedPageRecord({ url: 'https://example.com/' })).toBe(false);
    expect(isSerializedPageRecord({ ...serializePageRecord(records[0]), headings: [1] })).toBe(false);
  });
});

describe('formatSummary', () => {
  it('should list every page with its title, leaving empty titles blank', () => {
    expect(formatSummary('https://example.com/', records)).toBe(
      [
        'Web Scraping Summary',
        '===================',
        '',
        'Base URL: https://example.com/',
        'Total pages scraped: 2',
        'Scraped URLs:',
        '1. https://example.com/ - Welcome to Example',
        '2. https://example.com/about - ',
        '',
      ].join('\n')
    );
  });

  it('should still describe an empty crawl', () => {
    expect(formatSummary('https://example.com/', [])).toBe(
      'Web Scraping Summary\n===================\n\nBase URL: https://example.com/\nTotal pages scraped: 0\nScraped URLs:\n'
    );
  });
});

describe('FilePersistenceSink', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crawl-persistence-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it('should create the data directory and write both files', async () => {
    const dataDir = path.join(tmpDir, 'nested', 'data');
    const sink = new FilePersistenceSink(dataDir);

    const artifacts = await sink.persist('https://example.com/', records);

    expect(artifacts).toEqual({
      dataFile: path.join(dataDir, DATA_FILE_NAME),
      summaryFile: path.join(dataDir, SUMMARY_FILE_NAME),
    });

    const data = await fs.promises.readFile(artifacts.dataFile, 'utf-8');
    expect(JSON.parse(data)).toEqual(records.map(serializePageRecord));
    expect(data.startsWith('[\n  {\n    "url": "https://example.com/"')).toBe(true);

    const summary = await fs.promises.readFile(artifacts.summaryFile, 'utf-8');
    expect(summary).toBe(formatSummary('https://example.com/', records));
  });

  it('should overwrite the previous output', async () => {
    const sink = new FilePersistenceSink(tmpDir);
    await sink.persist('https://example.com/', records);

    await sink.persist('https://example.com/', []);

    await expect(sink.load()).resolves.toEqual([]);
  });

  it('should read back what it wrote', async () => {
    const sink = new FilePersistenceSink(tmpDir);
    await sink.persist('https://example.com/', records);

    await expect(sink.load()).resolves.toEqual(records.map(serializePageRecord));
  });

  it('should refuse a data file that is not a record list', async () => {
    const sink = new FilePersistenceSink(tmpDir);
    await fs.promises.writeFile(sink.dataFile, JSON.stringify({ pages: [] }), 'utf-8');

    await expect(sink.load()).rejects.toThrow(`${sink.dataFile} does not contain a page record list`);
  });
});
