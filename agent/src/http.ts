export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export interface TextResponse {
  ok: boolean;
  status: number;
  body: string;
}

/**
 * Fetches a URL and reads the whole body as text under one deadline. The
 * deadline covers the body as well as the headers, so a server that
 * stalls mid-response still ends in RequestTimeoutError.
 */
export async function fetchText(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<TextResponse> {
  const controller = new AbortController();
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(new RequestTimeoutError(timeoutMs)),
      { once: true },
    );
  });

  const read = async (): Promise<TextResponse> => {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    const body = await res.text();
    return { ok: res.ok, status: res.status, body };
  };

  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await Promise.race([read(), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}
