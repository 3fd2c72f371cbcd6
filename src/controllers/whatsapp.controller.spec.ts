import { ResponseSender } from '../services/whatsapp.service';
import { ConversationEngine, InboundEvent } from '../types/conversation';
import { WaMessage, WaWebhookPayload } from '../types/whatsapp';
import { WhatsAppController, extractEvents, toInboundEvent } from './whatsapp.controller';

function message(overrides: Partial<WaMessage>): WaMessage {
  return { from: '94770000001', id: 'wamid.1', timestamp: '1700000000', type: 'text', ...overrides };
}

describe('WhatsApp inbound mapping', () => {
  it('maps text messages to free text', () => {
    expect(toInboundEvent(message({ text: { body: 'hi' } }), { wa_id: '94770000001', profile: { name: 'Nadia' } })).toEqual({
      chatId: '94770000001',
      senderName: 'Nadia',
      kind: 'freeText',
      payload: 'hi',
    });
  });

  it('maps button and list replies to menu selections', () => {
    const button = message({
      type: 'interactive',
      interactive: { type: 'button_reply', button_reply: { id: 'role_passenger', title: '👤 Passenger' } },
    });
    const list = message({
      type: 'interactive',
      interactive: { type: 'list_reply', list_reply: { id: 'route:Kandy-Colombo', title: 'Kandy-Colombo' } },
    });

    expect(toInboundEvent(button)).toMatchObject({ kind: 'menuSelection', payload: 'role_passenger' });
    expect(toInboundEvent(list)).toMatchObject({ kind: 'menuSelection', payload: 'route:Kandy-Colombo' });
  });

  it('uses the template button payload, falling back to its text', () => {
    expect(toInboundEvent(message({ type: 'button', button: { payload: 'menu_main', text: 'Menu' } }))).toMatchObject({
      kind: 'menuSelection',
      payload: 'menu_main',
    });
    expect(toInboundEvent(message({ type: 'button', button: { text: 'Menu' } }))).toMatchObject({ payload: 'Menu' });
  });

  it('turns media into empty free text', () => {
    expect(toInboundEvent(message({ type: 'image' }))).toMatchObject({ kind: 'freeText', payload: '' });
  });

  it('extracts every message and skips status updates', () => {
    const payload: WaWebhookPayload = {
      object: 'whatsapp_business_account',
      entry: [
        {
          id: 'entry-1',
          changes: [
            {
              field: 'messages',
              value: {
                messaging_product: 'whatsapp',
                statuses: [{ id: 'wamid.0', status: 'delivered', timestamp: '1700000000', recipient_id: '94770000001' }],
              },
            },
            {
              field: 'messages',
              value: {
                messaging_product: 'whatsapp',
                contacts: [
                  { wa_id: '94770000001', profile: { name: 'Nadia' } },
                  { wa_id: '94770000002', profile: { name: 'Ravi' } },
                ],
                messages: [
                  message({ id: 'wamid.1', text: { body: 'hi' } }),
                  message({ id: 'wamid.2', from: '94770000002', text: { body: 'menu' } }),
                ],
              },
            },
          ],
        },
      ],
    };

    expect(extractEvents(payload)).toEqual([
      { messageId: 'wamid.1', event: { chatId: '94770000001', senderName: 'Nadia', kind: 'freeText', payload: 'hi' } },
      { messageId: 'wamid.2', event: { chatId: '94770000002', senderName: 'Ravi', kind: 'freeText', payload: 'menu' } },
    ]);
  });

  it('returns nothing for payloads without entries', () => {
    expect(extractEvents({ object: 'whatsapp_business_account' })).toEqual([]);
  });
});

describe('WhatsAppController.processPayload', () => {
  function payloadWith(messages: WaMessage[]): WaWebhookPayload {
    return {
      object: 'whatsapp_business_account',
      entry: [{ id: 'entry-1', changes: [{ field: 'messages', value: { messaging_product: 'whatsapp', messages } }] }],
    };
  }

  it('keeps processing later messages after one delivery fails', async () => {
    const engine: ConversationEngine = {
      handleEvent: jest.fn(async (event: InboundEvent) => ({ chatId: event.chatId, text: `echo ${event.payload}` })),
    };
    const deliver = jest.fn().mockRejectedValueOnce(new Error('WhatsApp API request failed')).mockResolvedValue(undefined);
    const sender: ResponseSender = { deliver, markAsRead: jest.fn().mockResolvedValue(undefined) };
    const controller = new WhatsAppController(engine, sender, 'test-verify-token');

    await controller.processPayload(
      payloadWith([
        message({ id: 'wamid.1', from: '94770000001', text: { body: 'hi' } }),
        message({ id: 'wamid.2', from: '94770000002', text: { body: 'menu' } }),
      ])
    );

    expect(engine.handleEvent).toHaveBeenCalledTimes(2);
    expect(deliver).toHaveBeenCalledTimes(2);
    expect(deliver).toHaveBeenLastCalledWith({ chatId: '94770000002', text: 'echo menu' });
  });

  it('keeps processing later messages after the engine fails', async () => {
    const handleEvent = jest
      .fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue({ chatId: '94770000002', text: 'ok' });
    const deliver = jest.fn().mockResolvedValue(undefined);
    const controller = new WhatsAppController(
      { handleEvent },
      { deliver, markAsRead: jest.fn().mockResolvedValue(undefined) },
      undefined
    );

    await controller.processPayload(
      payloadWith([
        message({ id: 'wamid.1', text: { body: 'hi' } }),
        message({ id: 'wamid.2', from: '94770000002', text: { body: 'hi' } }),
      ])
    );

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver).toHaveBeenCalledWith({ chatId: '94770000002', text: 'ok' });
  });
});
