/**
 * Shared constants for the summarizer and its tool server
 */

export const SERVER_NAME = 'textsum-mcp';
export const SERVER_VERSION = '1.0.0';

export const DEFAULT_MAX_SENTENCES = 3;
export const DEFAULT_RATIO = 0.25;
export const DEFAULT_MIN_SENTENCE_LENGTH = 30;

// Up to this many sentences, or under this many characters, the whole text is the summary
export const SHORT_DOCUMENT_MAX_SENTENCES = 2;
export const SHORT_DOCUMENT_MIN_CHARS = 200;

export const MIN_TOKEN_LENGTH = 3;
