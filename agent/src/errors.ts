/**
 * Failures raised by the completion client. Every variant extends
 * OracleError so callers can treat the whole family at once.
 */
export class OracleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleError";
  }
}

export class TemplateRenderError extends OracleError {
  constructor(
    readonly template: string,
    readonly missing: string[],
  ) {
    super(
      `Template '${template}' is missing values for: ${missing.join(", ")}`,
    );
    this.name = "TemplateRenderError";
  }
}

export class TransportError extends OracleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class UpstreamError extends OracleError {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Completion service responded with HTTP ${status}: ${body}`);
    this.name = "UpstreamError";
  }
}

export class MalformedResponseError extends OracleError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class JsonParseError extends OracleError {
  constructor(
    readonly payload: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Completion output is not valid JSON: ${payload.slice(0, 200)}`,
      options,
    );
    this.name = "JsonParseError";
  }
}

export class OracleConfigurationError extends OracleError {
  constructor(message: string) {
    super(message);
    this.name = "OracleConfigurationError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
