export const SenderRoles = Object.freeze({
  ADULT: "adult",
  MINOR: "minor",
  UNKNOWN: "unknown"
});

export type SenderRole = (typeof SenderRoles)[keyof typeof SenderRoles];

export const VALID_SENDER_ROLES: ReadonlySet<string> = new Set<string>(Object.values(SenderRoles));

export function isSenderRole(value: unknown): value is SenderRole {
  return typeof value === "string" && VALID_SENDER_ROLES.has(value);
}
