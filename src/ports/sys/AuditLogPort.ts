export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface AuditLogPort {
  append(streamId: string, entry: JsonObject): void;
  /** Up to `limit` most recent entries, newest first; all of them when omitted. */
  tail(streamId: string, limit?: number): unknown[];
}
