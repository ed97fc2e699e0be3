/**
 * Message Formatter
 *
 * Builds the HTML payloads sent to Telegram and splits oversized text
 * into message-sized chunks.
 */

/** Hard limit of the Bot API on parsed message text */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Title header followed by the log text in a preformatted block
 */
export function formatLogMessage(title: string, body: string): string {
  return `<b>${escapeHtml(title)}</b>\n<pre>${escapeHtml(body)}</pre>`;
}

/**
 * Caption for logs uploaded as a document
 */
export function formatFileCaption(title: string): string {
  return `${title}: too many logs for text messages, this file contains the logs.`;
}

/**
 * Largest body that still fits a message once the title line is added.
 * Telegram counts the text after entity parsing, so markup is free.
 */
export function messageCeiling(title: string, maxMessageLength: number): number {
  return Math.max(1, Math.min(maxMessageLength, TELEGRAM_MESSAGE_LIMIT - title.length - 1));
}

/**
 * Split off the first chunk of at most `limit` characters, cutting after the
 * last newline in the window; a single line longer than the limit is cut hard.
 * Returns the chunk and the rest.
 */
export function takeChunk(text: string, limit: number): [chunk: string, rest: string] {
  if (text.length <= limit) {
    return [text, ''];
  }

  const cut = text.lastIndexOf('\n', limit - 1);
  let end = cut > 0 ? cut + 1 : limit;

  // Keep surrogate pairs together on a hard cut
  if (cut <= 0 && end > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end--;
  }

  return [text.slice(0, end), text.slice(end)];
}

/**
 * Split text into chunks of at most `limit` characters (see `takeChunk`)
 */
export function splitIntoChunks(text: string, limit: number): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > 0) {
    const [chunk, next] = takeChunk(rest, limit);
    chunks.push(chunk);
    rest = next;
  }

  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Escape the characters Telegram's HTML parse mode treats as markup
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
