import { JsonParseError } from "./errors.js";

/**
 * Removes an optional markdown fence around a model reply:
 * a leading ```json (or bare ```) and a trailing ```.
 */
export function stripCodeFence(text: string): string {
  let body = text.trim();
  const opening = body.match(/^```[A-Za-z]*\s*/);
  if (opening) {
    body = body.slice(opening[0].length);
  }
  if (body.endsWith("```")) {
    body = body.slice(0, -3);
  }
  return body.trim();
}

export function parseJsonPayload(text: string): unknown {
  const body = stripCodeFence(text);
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new JsonParseError(body, { cause: error });
  }
}
