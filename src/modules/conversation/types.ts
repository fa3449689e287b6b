import type { SenderRole } from "./constants.js";

export interface Message {
  readonly message_id: string;
  readonly timestamp_utc: string;
  readonly sender_role: SenderRole;
  /** Sanitized, abstracted representation of the message. Never shown to analysts. */
  readonly abstracted_text: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface Conversation {
  readonly conversation_id: string;
  readonly messages: readonly Message[];
  readonly start_time_utc: string;
  readonly end_time_utc?: string;
  readonly platform_type?: string;
  readonly is_synthetic: boolean;
}

export interface RawMessage {
  message_id?: unknown;
  messageId?: unknown;
  id?: unknown;
  timestamp_utc?: unknown;
  timestampUtc?: unknown;
  timestamp?: unknown;
  sender_role?: unknown;
  senderRole?: unknown;
  role?: unknown;
  abstracted_text?: unknown;
  abstractedText?: unknown;
  text?: unknown;
  metadata?: unknown;
  [key: string]: unknown;
}

export interface RawConversation {
  conversation_id?: unknown;
  conversationId?: unknown;
  id?: unknown;
  messages?: unknown;
  start_time_utc?: unknown;
  startTimeUtc?: unknown;
  start_time?: unknown;
  end_time_utc?: unknown;
  endTimeUtc?: unknown;
  end_time?: unknown;
  platform_type?: unknown;
  platformType?: unknown;
  is_synthetic?: unknown;
  isSynthetic?: unknown;
  [key: string]: unknown;
}
