/**
 * Transport-agnostic input: a button/list selection or typed text
 */
export interface InboundEvent {
  chatId: string;
  kind: 'menuSelection' | 'freeText';
  payload: string;
  senderName?: string;
}

export interface MenuOption {
  label: string;
  value: string;
  description?: string;
}

/**
 * A prompt or result sent back to the chat, with the options for the next step
 */
export interface OutboundResponse {
  chatId: string;
  text: string;
  menu?: MenuOption[];
  // Non-fatal notice; the conversation stays where it was
  alert?: boolean;
}

/**
 * Turns one inbound event into one response; implemented by ConversationHandler
 */
export interface ConversationEngine {
  handleEvent(event: InboundEvent): Promise<OutboundResponse>;
}
