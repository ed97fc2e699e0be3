import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './errors.js';
import { normalizeIgnorePatterns } from './filter/index.js';
import type { ChatId, HandlerConfig, TelegramLogHandlerOptions } from './types.js';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

export const DEFAULTS = {
  title: 'TGLogger',
  updateIntervalSeconds: 5,
  minimumLines: 1,
  pendingLogs: 200000,
  maxMessageLength: 4050,
  retryAttempts: 3,
  retryDelayMs: 1000,
  maxFloodWaits: 5,
  fileName: 'tglogger.log',
} as const;

const MAX_TITLE_LENGTH = 256;

function getEnvVar(key: string, defaultValue?: string, env: Env = process.env): string {
  const value = env[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, env: Env = process.env): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, env: Env = process.env): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

// Diagnostic logger configuration
export const diagnostics = {
  level: getEnvVar('TGLOG_LOG_LEVEL', 'info'),
  file: process.env.TGLOG_LOG_FILE,
} as const;

function parseChatId(raw: string): ChatId {
  return /^-?\d+$/.test(raw) ? Number(raw) : raw;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

/**
 * Apply defaults, validate and freeze handler options
 */
export function resolveHandlerConfig(options: TelegramLogHandlerOptions): HandlerConfig {
  if (typeof options.token !== 'string' || options.token.trim() === '') {
    throw new ConfigurationError('A bot token is required');
  }

  const chatId = options.chatId;
  if (typeof chatId === 'string' ? chatId.trim() === '' : !Number.isInteger(chatId)) {
    throw new ConfigurationError(`Invalid chat id: ${String(chatId)}`);
  }

  const topicId = options.topicId ?? 0;
  requireInteger('topicId', topicId, 0);

  const title = options.title ?? DEFAULTS.title;
  if (title.length > MAX_TITLE_LENGTH) {
    throw new ConfigurationError(`title must be at most ${MAX_TITLE_LENGTH} characters`);
  }

  const updateIntervalSeconds = requirePositive(
    'updateIntervalSeconds',
    options.updateIntervalSeconds ?? DEFAULTS.updateIntervalSeconds
  );

  const resolved: HandlerConfig = {
    token: options.token,
    chatId,
    topicId: topicId > 0 ? topicId : null,
    title,
    ignorePatterns: normalizeIgnorePatterns(options.ignore),
    updateIntervalMs: updateIntervalSeconds * 1000,
    minimumLines: requireInteger('minimumLines', options.minimumLines ?? DEFAULTS.minimumLines, 0),
    pendingLogs: requirePositive('pendingLogs', options.pendingLogs ?? DEFAULTS.pendingLogs),
    maxMessageLength: requireInteger(
      'maxMessageLength',
      options.maxMessageLength ?? DEFAULTS.maxMessageLength,
      1
    ),
    retryAttempts: requireInteger('retryAttempts', options.retryAttempts ?? DEFAULTS.retryAttempts, 1),
    retryDelayMs: requireInteger('retryDelayMs', options.retryDelayMs ?? DEFAULTS.retryDelayMs, 0),
    maxFloodWaits: requireInteger('maxFloodWaits', options.maxFloodWaits ?? DEFAULTS.maxFloodWaits, 0),
    fileName: options.fileName ?? DEFAULTS.fileName,
    verifyOnStart: options.verifyOnStart ?? true,
  };

  return Object.freeze(resolved);
}

/**
 * Build handler options from TGLOG_* environment variables.
 * Values are validated when the handler resolves them.
 */
export function loadHandlerOptionsFromEnv(env: Env = process.env): TelegramLogHandlerOptions {
  const ignore = env.TGLOG_IGNORE?.split(',').map((pattern) => pattern.trim());

  return {
    token: getEnvVar('TGLOG_BOT_TOKEN', undefined, env),
    chatId: parseChatId(getEnvVar('TGLOG_CHAT_ID', undefined, env)),
    topicId: getEnvNumber('TGLOG_TOPIC_ID', env),
    title: env.TGLOG_TITLE,
    ignore,
    updateIntervalSeconds: getEnvNumber('TGLOG_UPDATE_INTERVAL', env),
    minimumLines: getEnvNumber('TGLOG_MINIMUM_LINES', env),
    pendingLogs: getEnvNumber('TGLOG_PENDING_LOGS', env),
    retryAttempts: getEnvNumber('TGLOG_RETRY_ATTEMPTS', env),
    retryDelayMs: getEnvNumber('TGLOG_RETRY_DELAY_MS', env),
    maxFloodWaits: getEnvNumber('TGLOG_MAX_FLOOD_WAITS', env),
    verifyOnStart: getEnvBoolean('TGLOG_VERIFY_ON_START', env),
  };
}
