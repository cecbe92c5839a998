import { InterpolationError } from "./errors.js";

/**
 * Values carried between the steps of one run. Owned by a single
 * orchestrator and dropped when the run ends.
 */
export class RunContext {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.values.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

/**
 * tolerant: any missing key leaves the text untouched.
 * strict: any missing key throws InterpolationError.
 */
export type InterpolationPolicy = "tolerant" | "strict";

// `{{` and `}}` are escaped braces; `{name}` is a marker.
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function findMarkers(text: string): string[] {
  const keys: string[] = [];
  for (const match of text.matchAll(TOKEN)) {
    if (match[1] !== undefined && !keys.includes(match[1])) {
      keys.push(match[1]);
    }
  }
  return keys;
}

export function interpolate(
  text: string,
  context: RunContext,
  policy: InterpolationPolicy,
): string {
  const missing = findMarkers(text).filter((key) => !context.has(key));
  if (missing.length > 0) {
    if (policy === "strict") throw new InterpolationError(missing);
    return text;
  }

  return text.replace(TOKEN, (token, key: string | undefined) => {
    if (key === undefined) return token === "{{" ? "{" : "}";
    return context.get(key) ?? token;
  });
}
