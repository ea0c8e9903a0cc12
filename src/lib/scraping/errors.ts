/**
 * Crawl Error Handling
 * Error classes and classification of page-level failures
 */

export enum ScrapingErrorType {
  SETUP_FAILURE = 'SETUP_FAILURE',
  BROWSER_CLOSED = 'BROWSER_CLOSED',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
  /**
   * False when the crawl session cannot continue (no browser to drive)
   */
  recoverable: boolean;
}

export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The browser or its page could not be created
 */
export class BrowserSetupError extends CrawlerError {}

/**
 * A page failed to load or answered with a non-200 status
 */
export class NavigationError extends CrawlerError {
  constructor(
    readonly url: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The ledger was asked to break one of its invariants
 */
export class LedgerError extends CrawlerError {}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Classify a failure for diagnostics and decide whether the crawl can go on
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingError {
  if (error instanceof BrowserSetupError) {
    return {
      type: ScrapingErrorType.SETUP_FAILURE,
      message: error.message,
      recoverable: false,
    };
  }

  const message = toError(error).message;
  const code = statusCode ?? (error instanceof NavigationError ? error.statusCode : undefined);

  // Browser went away under us
  if (
    message.includes('Target page, context or browser has been closed') ||
    message.includes('Browser has been closed') ||
    message.includes('Browser closed')
  ) {
    return {
      type: ScrapingErrorType.BROWSER_CLOSED,
      message: 'Browser has been closed',
      recoverable: false,
    };
  }

  // Timeout errors
  if (
    message.includes('Timeout') ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT')
  ) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Page load timed out',
      statusCode: code,
      recoverable: true,
    };
  }

  // Network errors
  if (
    message.includes('net::') ||
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN')
  ) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      statusCode: code,
      recoverable: true,
    };
  }

  // Status code based errors
  if (code !== undefined) {
    if (code === 429) {
      return {
        type: ScrapingErrorType.RATE_LIMITED,
        message: 'Rate limited by server',
        statusCode: code,
        recoverable: true,
      };
    }

    if (code === 401 || code === 403) {
      return {
        type: ScrapingErrorType.AUTH_REQUIRED,
        message: 'Authentication required',
        statusCode: code,
        recoverable: true,
      };
    }

    if (code === 404 || code === 410) {
      return {
        type: ScrapingErrorType.NOT_FOUND,
        message: 'Page not found',
        statusCode: code,
        recoverable: true,
      };
    }

    if (code >= 500) {
      return {
        type: ScrapingErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode: code,
        recoverable: true,
      };
    }

    return {
      type: ScrapingErrorType.HTTP_ERROR,
      message: `Unexpected HTTP ${code}`,
      statusCode: code,
      recoverable: true,
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
    recoverable: true,
  };
}
