/**
 * Maps node-telegram-bot-api rejections onto FloodWaitError / TransportError
 */

import { FloodWaitError, TransportError } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * ETELEGRAM errors carry the HTTP response with the parsed API body;
 * network failures (EFATAL) have no response at all.
 */
export function classifyTelegramError(error: unknown): FloodWaitError | TransportError {
  if (error instanceof FloodWaitError || error instanceof TransportError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const rawResponse = isRecord(error) ? error.response : undefined;
  const response = isRecord(rawResponse) ? rawResponse : null;
  const rawBody = response?.body;
  const body = isRecord(rawBody) ? rawBody : null;

  const statusCode = response?.statusCode;
  const errorCode = body?.error_code;
  let status: number | undefined;
  if (typeof statusCode === 'number') {
    status = statusCode;
  } else if (typeof errorCode === 'number') {
    status = errorCode;
  }

  const rawDescription = body?.description;
  const description = typeof rawDescription === 'string' ? rawDescription : message;

  if (status === 429) {
    const rawParameters = body?.parameters;
    const parameters = isRecord(rawParameters) ? rawParameters : null;
    const rawRetryAfter = parameters?.retry_after;
    const retryAfter = typeof rawRetryAfter === 'number' ? rawRetryAfter : 0;
    return new FloodWaitError(retryAfter * 1000, description);
  }

  return new TransportError(description, status, body ?? undefined);
}

/**
 * Telegram rejects edits that leave the text unchanged
 */
export function isNotModified(error: TransportError): boolean {
  return error.isBadRequest && error.message.includes('message is not modified');
}
