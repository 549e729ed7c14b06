import WebSocket from "ws";
import { ConnectionError, toError } from "./errors.js";
import { AsyncMutex, withTimeout } from "./utils.js";

/**
 * Duplex text channel to one relay
 */
export interface RelayChannel {
  /** Send one complete frame */
  send(frame: string): Promise<void>;
  /** Next inbound frame, or null once the channel is closed */
  receive(): Promise<string | null>;
  close(): Promise<void>;
}

/**
 * Opens a channel to a relay URL
 */
export type ChannelFactory = (url: string, timeoutMs: number) => Promise<RelayChannel>;

/**
 * RelayChannel over a `ws` WebSocket. Inbound frames are queued until
 * receive() takes them.
 */
export class WebSocketChannel implements RelayChannel {
  private queue: string[] = [];
  private readers: Array<(frame: string | null) => void> = [];
  private closed = false;

  constructor(
    private readonly url: string,
    private readonly ws: WebSocket
  ) {
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      this.push(data.toString());
    });
    ws.on("close", () => this.end());
    ws.on("error", (error: Error) => {
      console.error(`WebSocket error from ${this.url}:`, error.message);
      this.end();
    });
  }

  send(frame: string): Promise<void> {
    if (this.closed || this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError(this.url, "connection is not open"));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(frame, (error?: Error) => {
        if (error) {
          reject(new ConnectionError(this.url, `send failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<string | null> {
    const frame = this.queue.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.readers.push(resolve));
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      this.end();
      return;
    }
    await new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }

  private push(frame: string): void {
    const reader = this.readers.shift();
    if (reader) {
      reader(frame);
    } else {
      this.queue.push(frame);
    }
  }

  private end(): void {
    if (this.closed) return;
    this.closed = true;
    for (const reader of this.readers) {
      reader(null);
    }
    this.readers = [];
  }
}

/**
 * Open a WebSocket to the relay, failing with ConnectionError on error or timeout
 */
export const connectWebSocket: ChannelFactory = async (url, timeoutMs) => {
  const ws = new WebSocket(url);
  const channel = new WebSocketChannel(url, ws);

  try {
    await withTimeout(
      new Promise<void>((resolve, reject) => {
        ws.once("open", () => resolve());
        ws.once("error", reject);
      }),
      timeoutMs,
      `Connection to ${url} timed out`
    );
  } catch (error) {
    ws.terminate();
    throw new ConnectionError(url, toError(error).message, error);
  }

  return channel;
};

/**
 * A relay URL and the channel to it. Writes are serialized so frames from
 * concurrent callers never interleave.
 */
export class RelaySession {
  readonly url: string;
  private readonly channel: RelayChannel;
  private readonly writeLock = new AsyncMutex();
  private open = true;

  constructor(url: string, channel: RelayChannel) {
    this.url = url;
    this.channel = channel;
  }

  get isOpen(): boolean {
    return this.open;
  }

  send(frame: string): Promise<void> {
    if (!this.open) {
      return Promise.reject(new ConnectionError(this.url, "session is closed"));
    }
    return this.writeLock.run(() => this.channel.send(frame));
  }

  async receive(): Promise<string | null> {
    const frame = await this.channel.receive();
    if (frame === null) this.open = false;
    return frame;
  }

  async close(): Promise<void> {
    this.open = false;
    await this.channel.close();
  }
}
