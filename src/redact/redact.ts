/**
 * Redaction boundary. Applied only to the copy of an event that leaves the
 * machine; the stored payload is never touched.
 */

import { log } from "../log.js";
import { isJsonObject } from "../ingest/extract.js";
import type { JsonObject } from "../ingest/extract.js";
import { classify } from "./classifier.js";
import type { Classifier } from "./classifier.js";

const MESSAGE_EVENT_TYPES = new Set(["user", "assistant", "message"]);

/**
 * Deep-copy an event and pass the text of each message content block
 * through the classifier. Only user, assistant and message events with an
 * array of content blocks are considered.
 */
export function redactEvent(event: JsonObject, classifier: Classifier = classify): JsonObject {
  const copy = structuredClone(event);
  const type = copy.type;
  if (typeof type !== "string" || !MESSAGE_EVENT_TYPES.has(type)) return copy;

  const message = copy.message;
  if (!isJsonObject(message)) return copy;
  const content = message.content;
  if (!Array.isArray(content)) return copy;

  content.forEach((block, i) => {
    if (!isJsonObject(block) || block.type !== "text") return;
    const text = block.text;
    if (typeof text !== "string" || text.length === 0) return;
    const classified = classifier(text);
    if (classified !== text) {
      content[i] = { ...block, text: classified };
      log.warn("Secret detected and redacted in message");
    }
  });

  return copy;
}
