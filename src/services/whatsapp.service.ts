import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { MenuOption, OutboundResponse } from '../types/conversation';
import { WaApiResponse, WaButton, WaListSection, WaServiceResponse } from '../types/whatsapp';
import { AppError } from '../utils/AppError';

// WhatsApp Cloud API limits
const MAX_BUTTONS = 3;
const MAX_BUTTON_TITLE = 20;
const MAX_LIST_ROWS = 10;
const MAX_BODY = 1024;

export interface WhatsAppConfig {
  apiVersion: string;
  phoneNumberId?: string;
  accessToken?: string;
}

interface MetaErrorBody {
  error?: {
    message?: string;
    code?: number | string;
    type?: string;
    error_subcode?: number;
    fbtrace_id?: string;
  };
}

/**
 * Sends engine responses to a chat
 */
export interface ResponseSender {
  deliver(response: OutboundResponse): Promise<void>;
  markAsRead(messageId: string): Promise<void>;
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.substring(0, max - 3) + '...' : value;
}

/**
 * WhatsAppService handles communication with WhatsApp Cloud API
 */
export class WhatsAppService implements ResponseSender {
  private readonly axiosInstance: AxiosInstance;

  constructor(private readonly config: WhatsAppConfig) {
    this.axiosInstance = axios.create({
      baseURL: `https://graph.facebook.com/${config.apiVersion}/${config.phoneNumberId ?? 'PLACEHOLDER'}`,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  /**
   * Validates that required configuration is present
   * @throws AppError if configuration is missing
   */
  private validateConfig(): void {
    if (!this.config.phoneNumberId || !this.config.accessToken) {
      throw new AppError(
        'WhatsApp credentials not configured. Set WA_PHONE_NUMBER_ID and WA_ACCESS_TOKEN',
        500
      );
    }
  }

  /**
   * Sends a request to WhatsApp API, extracting Meta's error message on failure
   */
  private async sendRequest(endpoint: string, payload: Record<string, unknown>): Promise<WaApiResponse> {
    this.validateConfig();

    try {
      const response = await this.axiosInstance.post<WaApiResponse>(endpoint, payload, {
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
        },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError<MetaErrorBody>(error)) {
        const metaError = error.response?.data?.error;
        if (metaError) {
          logger.error('WhatsApp API error details:', {
            code: metaError.code,
            type: metaError.type,
            message: metaError.message,
            subcode: metaError.error_subcode,
            fbtrace_id: metaError.fbtrace_id,
          });
          throw new AppError(
            `WhatsApp API error (${metaError.type ?? 'UNKNOWN'}): ${metaError.message ?? 'WhatsApp API error'}`,
            500
          );
        }
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error('WhatsApp API error:', { endpoint, error: errorMessage });
      throw new AppError(`WhatsApp API request failed: ${errorMessage}`, 500);
    }
  }

  private async sendMessage(to: string, kind: string, payload: Record<string, unknown>): Promise<WaServiceResponse> {
    const response = await this.sendRequest('/messages', {
      messaging_product: 'whatsapp',
      to,
      ...payload,
    });

    const messageId = response.messages?.[0]?.id;
    if (!messageId) {
      throw new AppError('WhatsApp API returned no message ID', 500);
    }

    logger.info(`WhatsApp ${kind} sent: messageId=${messageId}`);
    return { messageId };
  }

  async sendText(to: string, body: string): Promise<WaServiceResponse> {
    return this.sendMessage(to, 'text', {
      type: 'text',
      text: { body },
    });
  }

  /**
   * Sends an interactive message with up to 3 reply buttons
   */
  async sendButtons(to: string, body: string, buttons: WaButton[]): Promise<WaServiceResponse> {
    if (buttons.length === 0 || buttons.length > MAX_BUTTONS) {
      throw new AppError(`Between 1 and ${MAX_BUTTONS} buttons allowed, got ${buttons.length}`, 500);
    }

    return this.sendMessage(to, 'buttons', {
      type: 'interactive',
      interactive: {
        type: 'button',
        body: { text: truncate(body, MAX_BODY) },
        action: {
          buttons: buttons.map((btn) => ({
            type: 'reply',
            reply: { id: btn.id, title: truncate(btn.title, MAX_BUTTON_TITLE) },
          })),
        },
      },
    });
  }

  /**
   * Sends an interactive list (max 10 rows total across all sections)
   */
  async sendList(to: string, body: string, buttonText: string, sections: WaListSection[]): Promise<WaServiceResponse> {
    const totalRows = sections.reduce((sum, section) => sum + section.rows.length, 0);
    if (totalRows === 0 || totalRows > MAX_LIST_ROWS) {
      throw new AppError(`Between 1 and ${MAX_LIST_ROWS} list rows allowed, got ${totalRows}`, 500);
    }

    // title max 24 chars, description max 72 chars, button max 20 chars
    const formattedSections = sections.map((section) => ({
      title: truncate(section.title, 24),
      rows: section.rows.map((row) => ({
        id: row.id,
        title: truncate(row.title, 24),
        description: truncate(row.description ?? '', 72),
      })),
    }));

    return this.sendMessage(to, 'list', {
      type: 'interactive',
      interactive: {
        type: 'list',
        body: { text: truncate(body, MAX_BODY) },
        action: {
          button: truncate(buttonText, MAX_BUTTON_TITLE),
          sections: formattedSections,
        },
      },
    });
  }

  /**
   * Picks the message type that fits the menu: plain text, reply buttons or a list
   */
  async deliver(response: OutboundResponse): Promise<void> {
    const menu: MenuOption[] = response.menu ?? [];

    if (menu.length === 0) {
      await this.sendText(response.chatId, response.text);
      return;
    }

    const fitsButtons =
      menu.length <= MAX_BUTTONS &&
      menu.every((option) => option.label.length <= MAX_BUTTON_TITLE && option.description === undefined);
    if (fitsButtons) {
      await this.sendButtons(
        response.chatId,
        response.text,
        menu.map((option) => ({ id: option.value, title: option.label }))
      );
      return;
    }

    if (menu.length > MAX_LIST_ROWS) {
      logger.warn(`Menu for ${response.chatId} has ${menu.length} options; only the first ${MAX_LIST_ROWS} are sent`);
    }
    await this.sendList(response.chatId, response.text, 'Choose', [
      {
        title: 'Options',
        rows: menu.slice(0, MAX_LIST_ROWS).map((option) => ({
          id: option.value,
          title: option.label,
          description: option.description,
        })),
      },
    ]);
  }

  /**
   * Marks a message as read. Never throws: read receipts are not critical.
   */
  async markAsRead(messageId: string): Promise<void> {
    if (!this.config.phoneNumberId || !this.config.accessToken) {
      logger.warn('Cannot mark message as read: WhatsApp credentials not configured');
      return;
    }

    try {
      await this.sendRequest('/messages', {
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId,
      });
      logger.debug(`WhatsApp message marked as read: messageId=${messageId}`);
    } catch (error) {
      logger.error(`Failed to mark WhatsApp message as read: messageId=${messageId}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
