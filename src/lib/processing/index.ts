/**
 * Content Processing
 * Main export file for page content processing
 */

export * from './text.processor';
export * from './html.processor';
export * from './content-extractor';
