/**
 * Derived fields of a session event, computed once when the event is written.
 *
 * Each JSONL record has a 'type' field (user, assistant, summary, ...). The
 * readable text can sit in three places, so message extraction is an ordered
 * list of rules over the parsed JSON; the first one that yields text wins.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface DerivedFields {
  event_type: string | null;
  event_message: string | null;
  event_session_id: string | null;
  event_uuid: string | null;
  event_git_branch: string | null;
  event_timestamp: string | null;
  event_model: string | null;
  event_input_tokens: number | null;
  event_cache_creation_input_tokens: number | null;
  event_cache_read_input_tokens: number | null;
  event_output_tokens: number | null;
}

export const DERIVED_COLUMNS = [
  "event_type",
  "event_message",
  "event_session_id",
  "event_uuid",
  "event_git_branch",
  "event_timestamp",
  "event_model",
  "event_input_tokens",
  "event_cache_creation_input_tokens",
  "event_cache_read_input_tokens",
  "event_output_tokens",
] as const satisfies readonly (keyof DerivedFields)[];

export interface MessageRule {
  name: string;
  extract(event: JsonObject): string | null;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(obj: JsonValue | undefined, key: string): JsonValue | undefined {
  return isJsonObject(obj) ? obj[key] : undefined;
}

function stringField(obj: JsonValue | undefined, key: string): string | null {
  const value = field(obj, key);
  return typeof value === "string" ? value : null;
}

function intField(obj: JsonValue | undefined, key: string): number | null {
  const value = field(obj, key);
  return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : null;
}

export const MESSAGE_RULES: readonly MessageRule[] = [
  {
    name: "content-blocks",
    extract(event) {
      const content = field(event.message, "content");
      if (!Array.isArray(content)) return null;
      const texts: string[] = [];
      for (const block of content) {
        const text = stringField(block, "text");
        if (text !== null) texts.push(text);
      }
      return texts.length > 0 ? texts.join("\n\n") : null;
    },
  },
  {
    name: "message-string",
    extract(event) {
      return stringField(event.message, "content");
    },
  },
  {
    name: "top-level-content",
    extract(event) {
      return stringField(event, "content");
    },
  },
];

export function extractMessage(event: JsonObject, rules: readonly MessageRule[] = MESSAGE_RULES): string | null {
  for (const rule of rules) {
    const text = rule.extract(event);
    if (text !== null) return text;
  }
  return null;
}

export function deriveFields(event: JsonObject): DerivedFields {
  const usage = field(event.message, "usage");
  return {
    event_type: stringField(event, "type"),
    event_message: extractMessage(event),
    event_session_id: stringField(event, "sessionId"),
    event_uuid: stringField(event, "uuid"),
    event_git_branch: stringField(event, "gitBranch"),
    event_timestamp: stringField(event, "timestamp"),
    event_model: stringField(event.message, "model"),
    event_input_tokens: intField(usage, "input_tokens"),
    event_cache_creation_input_tokens: intField(usage, "cache_creation_input_tokens"),
    event_cache_read_input_tokens: intField(usage, "cache_read_input_tokens"),
    event_output_tokens: intField(usage, "output_tokens"),
  };
}

export type ParsedLine =
  | { ok: true; event: JsonObject }
  | { ok: false; reason: string };

/**
 * Parse one JSONL line. Only JSON objects count as events.
 */
export function parseEventLine(line: string): ParsedLine {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  if (!isJsonObject(parsed)) {
    return { ok: false, reason: `expected a JSON object, got ${Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed}` };
  }
  return { ok: true, event: parsed };
}
