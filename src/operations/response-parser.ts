/**
 * Response Parser
 *
 * Pulls the JSON payload out of free-form model output. Models often wrap
 * JSON in Markdown fences or add a sentence before or after it.
 */

/**
 * Thrown when generated text does not contain a parseable JSON payload
 */
export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseParseError';
    Object.setPrototypeOf(this, ResponseParseError.prototype);
  }
}

const DELIMITERS = {
  object: { open: '{', close: '}' },
  array: { open: '[', close: ']' },
} as const;

/**
 * Extract and parse the outermost JSON object or array from model output.
 */
export function extractJson(text: string, expects: 'object' | 'array'): unknown {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ResponseParseError('Engine returned an empty response');
  }

  const { open, close } = DELIMITERS[expects];
  const start = trimmed.indexOf(open);
  const end = trimmed.lastIndexOf(close);
  if (start < 0 || end <= start) {
    throw new ResponseParseError(`No JSON ${expects} found in engine response`);
  }

  try {
    return JSON.parse(trimmed.slice(start, end + 1));
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error';
    throw new ResponseParseError(`Malformed JSON ${expects} in engine response: ${reason}`);
  }
}

/**
 * Shorten raw output for error messages and logs
 */
export function excerpt(text: string, maxLength = 200): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > maxLength ? `${singleLine.slice(0, maxLength)}...` : singleLine;
}
