export const EventStreams = Object.freeze({
  CONVERSATION_SUBMISSIONS: "conversation-submissions",
  RISK_ASSESSMENTS: "risk-assessments",
  AUDIT_EVENTS: "audit-events"
});

export type EventStream = (typeof EventStreams)[keyof typeof EventStreams];

export function dlqStream(stream: string): string {
  return `${stream}.dlq`;
}
