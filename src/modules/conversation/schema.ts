import { randomUUID } from "node:crypto";

import { ValidationError } from "../../shared/errors.js";
import { isPlainObject } from "../../shared/records.js";
import { VALID_SENDER_ROLES, isSenderRole } from "./constants.js";
import type { Conversation, Message, RawConversation, RawMessage } from "./types.js";

function isIsoTimestamp(value: unknown): value is string {
  return (
    typeof value === "string" &&
    Number.isFinite(Date.parse(value)) &&
    value.includes("T")
  );
}

function assertString(field: string, value: unknown): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Invalid "${field}" in conversation schema`, field);
  }
}

function coerceString(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.trim() !== "") {
    return value;
  }
  return fallback;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function normalizeTimestamp(value: unknown, field: string): string {
  if (isIsoTimestamp(value)) {
    return new Date(value).toISOString();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value).toISOString();
  }
  throw new ValidationError(`Invalid "${field}" in conversation schema`, field);
}

export function timestampMs(message: Message): number {
  return Date.parse(message.timestamp_utc);
}

/**
 * Chronological copy of the messages. Equal timestamps keep their input order.
 */
export function sortMessagesByTime(messages: readonly Message[]): Message[] {
  return messages
    .map((message, index) => ({ message, index, at: timestampMs(message) }))
    .sort((left, right) => left.at - right.at || left.index - right.index)
    .map((entry) => entry.message);
}

export function conversationDurationHours(messages: readonly Message[]): number {
  if (messages.length < 2) {
    return 0;
  }
  const times = messages.map(timestampMs);
  return (Math.max(...times) - Math.min(...times)) / 3_600_000;
}

export function assertConversationSchema(
  conversation: unknown
): asserts conversation is Conversation {
  if (!isPlainObject(conversation)) {
    throw new ValidationError("Conversation must be an object");
  }

  assertString("conversation_id", conversation.conversation_id);
  if (!isIsoTimestamp(conversation.start_time_utc)) {
    throw new ValidationError('Invalid "start_time_utc" in conversation schema', "start_time_utc");
  }
  if (
    conversation.end_time_utc !== undefined &&
    !isIsoTimestamp(conversation.end_time_utc)
  ) {
    throw new ValidationError('Invalid "end_time_utc" in conversation schema', "end_time_utc");
  }
  if (typeof conversation.is_synthetic !== "boolean") {
    throw new ValidationError('Invalid "is_synthetic" in conversation schema', "is_synthetic");
  }

  const messages = conversation.messages;
  if (!Array.isArray(messages) || messages.length === 0) {
    throw new ValidationError("Conversation must contain at least one message", "messages");
  }

  messages.forEach((message: unknown, index: number) => {
    const prefix = `messages[${index}]`;
    if (!isPlainObject(message)) {
      throw new ValidationError(`Invalid "${prefix}" in conversation schema`, prefix);
    }
    assertString(`${prefix}.message_id`, message.message_id);
    if (!isIsoTimestamp(message.timestamp_utc)) {
      throw new ValidationError(
        `Invalid "${prefix}.timestamp_utc" in conversation schema`,
        `${prefix}.timestamp_utc`
      );
    }
    if (!isSenderRole(message.sender_role)) {
      throw new ValidationError(
        `Invalid "${prefix}.sender_role" value "${String(message.sender_role)}", expected one of ${[
          ...VALID_SENDER_ROLES
        ].join(", ")}`,
        `${prefix}.sender_role`
      );
    }
    if (typeof message.abstracted_text !== "string") {
      throw new ValidationError(
        `Invalid "${prefix}.abstracted_text" in conversation schema`,
        `${prefix}.abstracted_text`
      );
    }
    if (!isPlainObject(message.metadata)) {
      throw new ValidationError(
        `Invalid "${prefix}.metadata" in conversation schema`,
        `${prefix}.metadata`
      );
    }
  });
}

function normalizeRawMessage(rawMessage: unknown, index: number): Message {
  const prefix = `messages[${index}]`;
  if (!isPlainObject(rawMessage)) {
    throw new ValidationError(`Invalid "${prefix}" in conversation schema`, prefix);
  }
  const raw: RawMessage = rawMessage;

  const role = raw.sender_role ?? raw.senderRole ?? raw.role;
  const normalizedRole = typeof role === "string" ? role.trim().toLowerCase() : role;
  if (!isSenderRole(normalizedRole)) {
    throw new ValidationError(
      `Invalid "${prefix}.sender_role" value "${String(role)}", expected one of ${[
        ...VALID_SENDER_ROLES
      ].join(", ")}`,
      `${prefix}.sender_role`
    );
  }

  const text = raw.abstracted_text ?? raw.abstractedText ?? raw.text;
  if (typeof text !== "string") {
    throw new ValidationError(
      `Invalid "${prefix}.abstracted_text" in conversation schema`,
      `${prefix}.abstracted_text`
    );
  }

  const metadata = raw.metadata ?? {};
  if (!isPlainObject(metadata)) {
    throw new ValidationError(
      `Invalid "${prefix}.metadata" in conversation schema`,
      `${prefix}.metadata`
    );
  }

  return Object.freeze({
    message_id: coerceString(raw.message_id ?? raw.messageId ?? raw.id, randomUUID()),
    timestamp_utc: normalizeTimestamp(
      raw.timestamp_utc ?? raw.timestampUtc ?? raw.timestamp,
      `${prefix}.timestamp_utc`
    ),
    sender_role: normalizedRole,
    abstracted_text: text,
    metadata: Object.freeze({ ...metadata })
  });
}

/**
 * Accepts the snake_case record or its camelCase aliases, fills generated ids,
 * and derives start/end times from the messages when they are absent.
 */
export function normalizeConversation(rawConversation: unknown): Conversation {
  if (!isPlainObject(rawConversation)) {
    throw new ValidationError("Conversation must be an object");
  }
  const raw: RawConversation = rawConversation;

  if (!Array.isArray(raw.messages) || raw.messages.length === 0) {
    throw new ValidationError("Conversation must contain at least one message", "messages");
  }

  const messages = raw.messages.map((message: unknown, index: number) =>
    normalizeRawMessage(message, index)
  );
  const ordered = sortMessagesByTime(messages);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];

  const rawStart = raw.start_time_utc ?? raw.startTimeUtc ?? raw.start_time;
  const rawEnd = raw.end_time_utc ?? raw.endTimeUtc ?? raw.end_time;
  const platformType = optionalString(raw.platform_type ?? raw.platformType);

  const conversation: Conversation = Object.freeze({
    conversation_id: coerceString(
      raw.conversation_id ?? raw.conversationId ?? raw.id,
      randomUUID()
    ),
    messages: Object.freeze(messages),
    start_time_utc:
      rawStart !== undefined
        ? normalizeTimestamp(rawStart, "start_time_utc")
        : (first?.timestamp_utc ?? new Date().toISOString()),
    ...(rawEnd !== undefined
      ? { end_time_utc: normalizeTimestamp(rawEnd, "end_time_utc") }
      : last && ordered.length > 1
        ? { end_time_utc: last.timestamp_utc }
        : {}),
    ...(platformType ? { platform_type: platformType } : {}),
    is_synthetic: (raw.is_synthetic ?? raw.isSynthetic) === true
  });

  assertConversationSchema(conversation);
  return conversation;
}
