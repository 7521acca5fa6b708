export const MAX_URLS_PER_REQUEST = 64;

export const MIN_TIMEOUT_SECONDS = 1;
export const MAX_TIMEOUT_SECONDS = 60;

// Upper bound for both the request field and READER_MAX_CONCURRENCY
export const MAX_CONCURRENCY_LIMIT = 64;

export const REDIRECT_STATUS_CODES = [301, 302, 303, 307, 308];

export const DEFAULT_ACCEPT_HEADER =
  'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.5';
