import { Request, Response } from 'express';
import logger from '../config/logger';
import { ResponseSender } from '../services/whatsapp.service';
import { ConversationEngine, InboundEvent } from '../types/conversation';
import { WaContact, WaMessage, WaWebhookPayload } from '../types/whatsapp';

/**
 * Converts a WhatsApp message into an engine event.
 * Button and list replies carry the menu value as their id; everything else is free text.
 */
export function toInboundEvent(message: WaMessage, contact?: WaContact): InboundEvent {
  const base = { chatId: message.from, senderName: contact?.profile?.name };

  if (message.type === 'interactive' && message.interactive) {
    const reply = message.interactive.button_reply ?? message.interactive.list_reply;
    if (reply) {
      return { ...base, kind: 'menuSelection', payload: reply.id };
    }
  }

  if (message.type === 'button' && message.button) {
    return { ...base, kind: 'menuSelection', payload: message.button.payload ?? message.button.text };
  }

  // Media, locations and stickers arrive as empty text and fail the step's validation
  return { ...base, kind: 'freeText', payload: message.type === 'text' ? message.text?.body ?? '' : '' };
}

/**
 * Collects every inbound message of a webhook payload, skipping status updates
 */
export function extractEvents(payload: WaWebhookPayload): Array<{ messageId: string; event: InboundEvent }> {
  const events: Array<{ messageId: string; event: InboundEvent }> = [];

  const entries = Array.isArray(payload.entry) ? payload.entry : [];

  for (const entry of entries) {
    const changes = Array.isArray(entry.changes) ? entry.changes : [];
    for (const change of changes) {
      const value = change.value;
      if (Array.isArray(value.statuses) && value.statuses.length > 0) {
        logger.debug('WhatsApp status update received:', { statuses: value.statuses });
        continue;
      }

      const messages = Array.isArray(value.messages) ? value.messages : [];
      for (const message of messages) {
        const contact = value.contacts?.find((candidate) => candidate.wa_id === message.from) ?? value.contacts?.[0];
        events.push({ messageId: message.id, event: toInboundEvent(message, contact) });
      }
    }
  }

  return events;
}

/**
 * WhatsAppController handles webhook verification and incoming messages
 */
export class WhatsAppController {
  constructor(
    private readonly conversationHandler: ConversationEngine,
    private readonly sender: ResponseSender,
    private readonly verifyToken: string | undefined
  ) {}

  /**
   * GET /webhook?hub.mode=subscribe&hub.verify_token=...&hub.challenge=...
   */
  async verifyWebhook(req: Request, res: Response): Promise<void> {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    logger.info('Webhook verification attempt:', {
      mode,
      verifyToken: token ? '***' : 'missing',
      challenge: challenge ? 'present' : 'missing',
    });

    if (mode === 'subscribe' && this.verifyToken !== undefined && token === this.verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verification: Success');
      res.status(200).send(challenge);
    } else {
      logger.warn('Webhook verification: Failed - Invalid token or mode');
      res.status(403).send('Forbidden');
    }
  }

  /**
   * POST /webhook
   * Acknowledges immediately (Meta requirement), then runs each message through the engine.
   */
  async receiveWebhook(req: Request, res: Response): Promise<void> {
    res.status(200).send('OK');

    const payload: WaWebhookPayload = req.body ?? {};
    await this.processPayload(payload);
  }

  /**
   * Runs every message of a payload through the engine and delivers the replies.
   * A failed message is logged and the rest are still processed.
   */
  async processPayload(payload: WaWebhookPayload): Promise<void> {
    const events = extractEvents(payload);
    if (events.length === 0) {
      logger.debug('WhatsApp webhook without messages');
      return;
    }

    for (const { messageId, event } of events) {
      try {
        await this.sender.markAsRead(messageId);

        logger.info('WhatsApp message received:', {
          messageId,
          from: event.chatId,
          kind: event.kind,
          contactName: event.senderName,
        });

        const response = await this.conversationHandler.handleEvent(event);
        await this.sender.deliver(response);
      } catch (error) {
        logger.error('WhatsApp message processing error:', {
          messageId,
          from: event.chatId,
          error: error instanceof Error ? error.message : 'Unknown error',
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
    }
  }
}
