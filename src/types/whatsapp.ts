/**
 * WhatsApp Cloud API shapes used by the webhook transport (Graph API v18.0)
 */

export interface WaWebhookPayload {
  object: string;
  entry?: WaWebhookEntry[];
}

export interface WaWebhookEntry {
  id: string;
  changes?: WaWebhookChange[];
}

export interface WaWebhookChange {
  value: WaWebhookValue;
  field: string;
}

export interface WaWebhookValue {
  messaging_product: string;
  metadata?: {
    display_phone_number: string;
    phone_number_id: string;
  };
  contacts?: WaContact[];
  messages?: WaMessage[];
  statuses?: WaStatus[];
}

export interface WaContact {
  profile?: {
    name: string;
  };
  wa_id: string;
}

export interface WaMessage {
  from: string; // Sender's WhatsApp id; used as the chat id
  id: string;
  timestamp: string;
  type: 'text' | 'interactive' | 'button' | 'image' | 'video' | 'audio' | 'document' | 'location' | 'sticker';
  text?: {
    body: string;
  };
  interactive?: {
    type: 'button_reply' | 'list_reply';
    button_reply?: {
      id: string;
      title: string;
    };
    list_reply?: {
      id: string;
      title: string;
      description?: string;
    };
  };
  button?: {
    payload?: string;
    text: string;
  };
}

export interface WaStatus {
  id: string;
  status: 'sent' | 'delivered' | 'read' | 'failed';
  timestamp: string;
  recipient_id: string;
}

export interface WaApiResponse {
  messaging_product?: string;
  contacts?: Array<{
    input: string;
    wa_id: string;
  }>;
  messages?: Array<{
    id: string;
  }>;
  success?: boolean;
}

export interface WaButton {
  id: string;
  title: string;
}

export interface WaListRow {
  id: string;
  title: string;
  description?: string;
}

export interface WaListSection {
  title: string;
  rows: WaListRow[];
}

export interface WaServiceResponse {
  messageId: string;
}
