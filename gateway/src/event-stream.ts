import { describeError } from "../../agent/src/errors.js";
import type { EventBus } from "../../runtime/src/event-bus.js";
import type { RunEvent } from "../../runtime/src/events.js";

/** The part of a ws WebSocket the stream needs. */
export interface EventSocket {
  readonly readyState: number;
  send(data: string): void;
}

export const SOCKET_OPEN = 1;

export interface StreamOptions {
  /** Only forward events of this run. */
  runId?: string;
  /** Events recorded before the client connected, sent first. */
  replay?: readonly RunEvent[];
}

/**
 * Forwards bus events to one WebSocket client as JSON. A client whose send
 * throws is unsubscribed; the run carries on regardless.
 */
export function streamRunEvents(
  bus: EventBus<RunEvent>,
  socket: EventSocket,
  options: StreamOptions = {},
): () => void {
  const matches = (event: RunEvent) =>
    !options.runId || event.runId === options.runId;

  let active = true;
  let unsubscribe: (() => void) | undefined;
  const stop = () => {
    active = false;
    unsubscribe?.();
  };

  const deliver = (event: RunEvent) => {
    if (!active || socket.readyState !== SOCKET_OPEN) return;
    try {
      socket.send(JSON.stringify(event));
    } catch (error) {
      console.error(`🔌 Dropping event subscriber: ${describeError(error)}`);
      stop();
    }
  };

  for (const event of options.replay ?? []) {
    if (matches(event)) deliver(event);
  }

  if (active) {
    unsubscribe = bus.subscribe((event) => {
      if (matches(event)) deliver(event);
    });
  }
  return stop;
}

/**
 * Handles a message sent by a client on the event socket. Returns the
 * reply to send, if any.
 */
export function handleClientMessage(raw: string): string | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return JSON.stringify({ type: "error", message: "Invalid JSON message" });
  }

  if (typeof data === "object" && data !== null && "type" in data) {
    if (data.type === "ping") return JSON.stringify({ type: "pong" });
    return JSON.stringify({
      type: "error",
      message: `Unknown message type: ${String(data.type)}`,
    });
  }
  return JSON.stringify({ type: "error", message: "Message has no type" });
}
