/** An entry as stored on a stream, with its JSON payload already parsed. */
export interface StreamEntry<TMessage = unknown> {
  id: string;
  stream: string;
  message: TMessage;
  published_at_utc: string;
}

/** Payloads are untyped on the way in; the handler validates the shape. */
export interface DeliveredEntry extends StreamEntry {
  /** Handed out before without an ack. */
  redelivered: boolean;
}

export const DeadLetterReasons = Object.freeze({
  MALFORMED_PAYLOAD: "MALFORMED_PAYLOAD",
  INVALID_SUBMISSION: "INVALID_SUBMISSION",
  MAX_DELIVERIES_EXCEEDED: "MAX_DELIVERIES_EXCEEDED"
});

export type DeadLetterReason = (typeof DeadLetterReasons)[keyof typeof DeadLetterReasons];

/** Written to `<stream>.dlq` exactly as shown here. */
export interface DeadLetter {
  source_stream: string;
  source_message_id: string;
  reason: DeadLetterReason;
  payload: unknown;
  metadata: Record<string, unknown>;
}

export interface GroupReadRequest {
  stream: string;
  group: string;
  consumer: string;
  count: number;
  blockMs: number;
}

export interface EventPublisher {
  publish<TMessage>(stream: string, message: TMessage): Promise<StreamEntry<TMessage>>;
}

export interface GroupConsumer {
  ensureGroup(stream: string, group: string): Promise<void>;
  readGroup(request: GroupReadRequest): Promise<DeliveredEntry[]>;
  ack(stream: string, group: string, id: string): Promise<boolean>;
  deadLetter(letter: DeadLetter): Promise<string>;
}

export type EventBus = EventPublisher & GroupConsumer;
