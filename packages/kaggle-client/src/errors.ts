import { HttpStatusError } from '@kaggle-tools/core';

/**
 * Non-2xx response from the Kaggle API
 */
export class KaggleApiError extends HttpStatusError {
  /** Request path relative to the API base URL, without query string */
  readonly endpoint: string;

  constructor(status: number, endpoint: string, statusText = '') {
    super(status, `Kaggle API ${endpoint} responded with ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'KaggleApiError';
    this.endpoint = endpoint;
  }
}

/**
 * Raised through the abort signal when a request exceeds its time budget
 */
export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised when a downloaded archive holds an entry that would land outside its target directory
 */
export class ArchiveError extends Error {
  readonly entry: string;

  constructor(entry: string, reason: string) {
    super(`Archive entry "${entry}" rejected: ${reason}`);
    this.name = 'ArchiveError';
    this.entry = entry;
  }
}
