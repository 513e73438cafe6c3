/**
 * Jetstream WebSocket client with a bounded reconnect policy.
 *
 * Failed connection attempts back off exponentially from `retryBaseMs`,
 * capped at `maxBackoffMs`. A successful open resets the failure count.
 * After `maxRetries` consecutive failures the connection gives up and
 * reports FirehoseConnectError through `onFatal`.
 */

import WebSocket, { RawData } from "ws";
import {
  FirehoseConnectError,
  FirehoseConnectionHandlers,
  FirehoseConnectionPort,
} from "../../ports/FirehoseConnectionPort";
import { logger } from "../logger";
import { buildJetstreamUrl } from "./JetstreamSchema";

export interface JetstreamConnectionOptions {
  url: string;
  wantedCollections: string[];
  maxRetries: number;
  retryBaseMs: number;
  maxBackoffMs?: number;
}

const DEFAULT_MAX_BACKOFF_MS = 30_000;

export function backoffDelay(failures: number, baseMs: number, maxMs: number = DEFAULT_MAX_BACKOFF_MS): number {
  const exponent = Math.max(failures - 1, 0);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export class JetstreamConnection implements FirehoseConnectionPort {
  private socket: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private failures = 0;
  private lastError: Error | undefined;
  private stopped = true;

  constructor(private readonly options: JetstreamConnectionOptions) {}

  open(handlers: FirehoseConnectionHandlers, cursor: () => number | null): void {
    this.stopped = false;
    this.failures = 0;
    this.connect(handlers, cursor);
  }

  async close(): Promise<void> {
    this.stopped = true;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      } else if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000, "shutdown");
      }
    });
  }

  private connect(handlers: FirehoseConnectionHandlers, cursor: () => number | null): void {
    const url = buildJetstreamUrl(this.options.url, this.options.wantedCollections, cursor());
    const socket = new WebSocket(url);
    this.socket = socket;
    let opened = false;

    socket.on("open", () => {
      opened = true;
      this.failures = 0;
      this.lastError = undefined;
      logger.info({
        type: "FIREHOSE_CONNECTED",
        message: "Connected to firehose",
        payload: { url },
      });
    });

    socket.on("message", (data: RawData) => {
      handlers.onMessage(rawDataToString(data));
    });

    // Always followed by "close", which drives the retry
    socket.on("error", (error: Error) => {
      this.lastError = error;
      if (!this.stopped) {
        logger.warn({
          type: "FIREHOSE_SOCKET_ERROR",
          message: "Firehose socket error",
          error,
        });
      }
    });

    socket.on("close", (code: number) => {
      if (this.socket === socket) {
        this.socket = null;
      }
      if (this.stopped) {
        return;
      }

      if (!opened) {
        this.failures++;
      }

      if (this.failures >= this.options.maxRetries) {
        handlers.onFatal(new FirehoseConnectError(this.failures, this.lastError));
        return;
      }

      const delay = backoffDelay(
        this.failures,
        this.options.retryBaseMs,
        this.options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS
      );
      logger.warn({
        type: "FIREHOSE_RECONNECTING",
        message: `Firehose closed (${code}), reconnecting in ${delay}ms`,
        payload: { failures: this.failures, maxRetries: this.options.maxRetries },
      });

      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        if (!this.stopped) {
          this.connect(handlers, cursor);
        }
      }, delay);
    });
  }
}
