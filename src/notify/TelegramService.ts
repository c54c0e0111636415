import { HttpClient } from '../core/HttpClient';
import { DeliveryError, HttpStatusError, errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { Listing, NotificationEvent } from '../types/listing';
import { formatListingMessage } from './formatMessage';
import { Notifier } from './Notifier';

export type TelegramParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  apiUrl: string;
  parseMode: TelegramParseMode;
  /** Minimum spacing between two messages */
  minIntervalMs: number;
  disableWebPagePreview: boolean;
}

export interface TelegramUser {
  id: number;
  isBot: boolean;
  username?: string;
  firstName: string;
}

interface TelegramEnvelope {
  ok: boolean;
  description?: string;
  result?: unknown;
}

function isEnvelope(body: unknown): body is TelegramEnvelope {
  return typeof body === 'object' && body !== null && 'ok' in body && typeof body.ok === 'boolean';
}

function describeBody(body: unknown): string {
  if (isEnvelope(body) && typeof body.description === 'string') {
    return body.description;
  }
  if (typeof body === 'string') {
    return body.slice(0, 200);
  }
  return '';
}

export class TelegramService implements Notifier {
  readonly channel = 'telegram';
  private readonly config: TelegramConfig;
  private readonly logger: StructuredLogger;
  private lastSentAt = 0;
  private sentCount = 0;
  private failedCount = 0;

  constructor(
    private readonly http: HttpClient,
    config: Pick<TelegramConfig, 'botToken' | 'chatId'> & Partial<TelegramConfig>,
    logger: StructuredLogger
  ) {
    this.config = {
      apiUrl: 'https://api.telegram.org',
      parseMode: 'Markdown',
      minIntervalMs: 1000,
      disableWebPagePreview: false,
      ...config
    };
    this.logger = logger.child('telegram');
  }

  async notify(listing: Listing): Promise<NotificationEvent> {
    const messageId = await this.sendMessage(formatListingMessage(listing), this.config.parseMode);
    return {
      listing,
      channel: this.channel,
      dispatchedAt: new Date().toISOString(),
      messageId
    };
  }

  async sendText(text: string): Promise<void> {
    await this.sendMessage(text);
  }

  /**
   * Sends one message and resolves with its Telegram message id once the API
   * has confirmed it. Rejects with DeliveryError otherwise.
   */
  async sendMessage(text: string, parseMode?: TelegramParseMode): Promise<number> {
    await this.waitForSlot();

    const payload: Record<string, string | boolean> = {
      chat_id: this.config.chatId,
      text,
      disable_web_page_preview: this.config.disableWebPagePreview
    };
    if (parseMode) {
      payload.parse_mode = parseMode;
    }

    try {
      const response = await this.http.post<unknown>(this.methodUrl('sendMessage'), payload);
      const body = response.data;

      if (!isEnvelope(body) || !body.ok) {
        throw new DeliveryError(`Telegram API error: ${describeBody(body) || 'unexpected response'}`, response.status);
      }

      this.sentCount++;
      this.logger.debug('Telegram message sent', { chatId: this.config.chatId });
      return extractMessageId(body.result);
    } catch (error) {
      this.failedCount++;
      throw this.toDeliveryError(error);
    } finally {
      this.lastSentAt = Date.now();
    }
  }

  async getMe(): Promise<TelegramUser> {
    try {
      const response = await this.http.get<unknown>(this.methodUrl('getMe'));
      const body = response.data;
      if (!isEnvelope(body) || !body.ok) {
        throw new DeliveryError(`Telegram getMe failed: ${describeBody(body) || 'unexpected response'}`, response.status);
      }
      return toTelegramUser(body.result);
    } catch (error) {
      throw this.toDeliveryError(error);
    }
  }

  getStatus(): { chatId: string; sent: number; failed: number; lastSentAt: number } {
    return {
      chatId: this.config.chatId,
      sent: this.sentCount,
      failed: this.failedCount,
      lastSentAt: this.lastSentAt
    };
  }

  private methodUrl(method: string): string {
    return `${this.config.apiUrl}/bot${this.config.botToken}/${method}`;
  }

  private async waitForSlot(): Promise<void> {
    const wait = this.lastSentAt + this.config.minIntervalMs - Date.now();
    if (this.lastSentAt > 0 && wait > 0) {
      await new Promise(resolve => setTimeout(resolve, wait));
    }
  }

  private toDeliveryError(error: unknown): DeliveryError {
    if (error instanceof DeliveryError) {
      return error;
    }

    if (error instanceof HttpStatusError) {
      const detail = describeBody(error.body);
      switch (error.status) {
        case 404:
          return new DeliveryError(
            `Telegram send failed (404 Not Found). Check the bot token and API URL.${detail ? ` Response: ${detail}` : ''}`,
            404,
            error
          );
        case 403:
          return new DeliveryError(
            "Telegram send failed (403 Forbidden). The chat hasn't started the bot, the chat id points to a bot, " +
              `or the bot lacks permission in the chat.${detail ? ` Response: ${detail}` : ''}`,
            403,
            error
          );
        default:
          return new DeliveryError(`Telegram send failed (${error.status}): ${detail || error.statusText}`, error.status, error);
      }
    }

    return new DeliveryError(`Telegram send exception: ${errorMessage(error)}`, undefined, error);
  }
}

function extractMessageId(result: unknown): number {
  if (typeof result === 'object' && result !== null && 'message_id' in result && typeof result.message_id === 'number') {
    return result.message_id;
  }
  return 0;
}

function toTelegramUser(result: unknown): TelegramUser {
  if (typeof result !== 'object' || result === null || !('id' in result) || typeof result.id !== 'number') {
    throw new DeliveryError('Telegram getMe returned no user');
  }

  const username = 'username' in result && typeof result.username === 'string' ? result.username : undefined;
  const firstName = 'first_name' in result && typeof result.first_name === 'string' ? result.first_name : '';
  const isBot = 'is_bot' in result && result.is_bot === true;

  return { id: result.id, isBot, username, firstName };
}
