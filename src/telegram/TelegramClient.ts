/**
 * Telegram Client
 *
 * Thin adapter over the Telegram Bot API. Routes every call to the
 * configured chat and forum topic and turns failures into FloodWaitError
 * or TransportError. Retrying is left to the delivery cycle.
 */

import TelegramBot from 'node-telegram-bot-api';
import { TransportError } from '../errors.js';
import { logger, maskSecret } from '../logger.js';
import type { ChatId } from '../types.js';
import { classifyTelegramError, isNotModified } from './errors.js';
import type { LogTransportClient, TelegramClientConfig } from './types.js';

export class TelegramClient implements LogTransportClient {
  private bot: TelegramBot;
  private chatId: ChatId;
  private topicId: number | null;

  constructor(config: TelegramClientConfig) {
    this.bot = new TelegramBot(config.botToken, { polling: false });
    this.chatId = config.chatId;
    this.topicId = config.topicId;

    logger.info('Telegram client initialized', {
      token: maskSecret(config.botToken),
      chatId: maskSecret(String(config.chatId)),
      topicId: config.topicId,
    });
  }

  public async sendMessage(text: string): Promise<number> {
    try {
      const message = await this.bot.sendMessage(this.chatId, text, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
        ...this.topicOptions(),
      });
      return message.message_id;
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  public async editMessage(messageId: number, text: string): Promise<void> {
    try {
      await this.bot.editMessageText(text, {
        chat_id: this.chatId,
        message_id: messageId,
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
    } catch (error) {
      const failure = classifyTelegramError(error);
      if (failure instanceof TransportError && isNotModified(failure)) {
        logger.debug('Edit left message unchanged', { messageId });
        return;
      }
      throw failure;
    }
  }

  public async sendFile(fileName: string, content: Buffer, caption: string): Promise<number> {
    try {
      const message = await this.bot.sendDocument(
        this.chatId,
        content,
        { caption, ...this.topicOptions() },
        { filename: fileName, contentType: 'text/plain' }
      );
      return message.message_id;
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<string | null> {
    try {
      const me = await this.bot.getMe();
      const name = me.username ?? me.first_name;
      logger.info('Telegram bot verified', { username: name });
      return name;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: classifyTelegramError(error).message,
      });
      return null;
    }
  }

  private topicOptions(): { message_thread_id?: number } {
    return this.topicId === null ? {} : { message_thread_id: this.topicId };
  }
}
