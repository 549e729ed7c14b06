import { EventEmitter } from "events";
import type {
  CollectOpts,
  CollectionResult,
  Event,
  NostrConfig,
  RelayMessage,
  ReqFilter,
  SubscriptionHandle,
} from "./types.js";
import {
  AlreadyConnectedError,
  InvalidInputError,
  NoRelaysError,
  RelayFanoutError,
  RelayNotFoundError,
  UrlParseError,
  toError,
} from "./errors.js";
import { isVerifiedEvent } from "./event.js";
import { Identity } from "./keys.js";
import type { MineOpts } from "./pow.js";
import {
  formatCloseMessage,
  formatEventMessage,
  formatReqMessage,
  matchFilters,
} from "./filter.js";
import { type ChannelFactory, RelaySession, connectWebSocket } from "./relay.js";
import { LiveSubscription } from "./stream.js";
import {
  Subscription,
  SubscriptionMatcher,
  extractEvents,
  parseRelayMessage,
} from "./subscription.js";
import { generateSubscriptionId, isValidRelayUrl, loadConfig } from "./utils.js";

/**
 * Relay pool events
 */
export interface RelayPoolEvents {
  "relay:connected": (url: string) => void;
  "relay:disconnected": (url: string) => void;
  "relay:error": (url: string, error: Error) => void;
  "relay:message": (url: string, message: RelayMessage) => void;
  event: (url: string, subscriptionId: string, event: Event) => void;
  eose: (url: string, subscriptionId: string) => void;
  ok: (url: string, eventId: string, accepted: boolean, message: string) => void;
  notice: (url: string, message: string) => void;
  closed: (url: string, subscriptionId: string, message: string) => void;
}

export interface RelayPool {
  on<E extends keyof RelayPoolEvents>(event: E, listener: RelayPoolEvents[E]): this;
  once<E extends keyof RelayPoolEvents>(event: E, listener: RelayPoolEvents[E]): this;
  off<E extends keyof RelayPoolEvents>(event: E, listener: RelayPoolEvents[E]): this;
  emit<E extends keyof RelayPoolEvents>(
    event: E,
    ...args: Parameters<RelayPoolEvents[E]>
  ): boolean;
}

interface FanoutResult {
  delivered: string[];
  failures: Map<string, Error>;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const DEFAULT_EOSE_TIMEOUT_MS = 5000;

/**
 * RelayPool manages connections to multiple Nostr relays: one session per
 * URL, fan-out of EVENT/REQ/CLOSE, and routing of inbound frames to
 * subscriptions
 */
export class RelayPool extends EventEmitter {
  private sessions = new Map<string, RelaySession>();
  private connecting = new Set<string>();
  private readLoops = new Map<string, Promise<void>>();
  private matcher = new SubscriptionMatcher();
  private config: Partial<NostrConfig>;
  private channelFactory: ChannelFactory;

  /** Signing identity for the configured `privkey`, if there is one */
  readonly identity: Identity | undefined;

  constructor(config: Partial<NostrConfig> = {}, channelFactory: ChannelFactory = connectWebSocket) {
    super();
    this.config = config;
    this.channelFactory = channelFactory;
    this.identity = config.privkey ? Identity.fromSecretKey(config.privkey) : undefined;
  }

  /** Difficulty the NIP helpers mine to when none is passed */
  get powDifficulty(): number {
    return this.config.powDifficulty ?? 0;
  }

  /** Mining options the NIP helpers use when none are passed */
  get mineOpts(): MineOpts {
    return { threads: this.config.powThreads ?? 1 };
  }

  /**
   * Connect to several relays, by default the configured ones.
   * Individual failures are logged; fails only when none connect.
   */
  async connect(urls: string[] = this.config.relays ?? []): Promise<string[]> {
    const results = await Promise.allSettled(urls.map((url) => this.addRelay(url)));

    const connected: string[] = [];
    const failures = new Map<string, Error>();
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        connected.push(urls[i]);
      } else {
        failures.set(urls[i], toError(result.reason));
      }
    });

    for (const [url, error] of failures) {
      console.warn(`Failed to connect to ${url}: ${error.message}`);
    }

    if (urls.length > 0 && connected.length === 0) {
      throw new RelayFanoutError("connect", connected, failures);
    }
    return connected;
  }

  /**
   * Open a session to a relay. Adding a URL that is already present fails.
   */
  async addRelay(url: string): Promise<void> {
    if (!isValidRelayUrl(url)) {
      throw new UrlParseError(url);
    }

    if (this.sessions.has(url) || this.connecting.has(url)) {
      throw new AlreadyConnectedError(url);
    }

    this.connecting.add(url);
    let session: RelaySession;
    try {
      const channel = await this.channelFactory(
        url,
        this.config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
      );
      session = new RelaySession(url, channel);
    } finally {
      this.connecting.delete(url);
    }

    this.sessions.set(url, session);
    this.readLoops.set(url, this.readLoop(session));
    this.emit("relay:connected", url);
  }

  /**
   * Close and forget a relay. Collections stop waiting on it.
   */
  async removeRelay(url: string): Promise<void> {
    const session = this.sessions.get(url);
    if (!session) {
      throw new RelayNotFoundError(url);
    }

    this.sessions.delete(url);
    this.matcher.dropRelay(url);

    try {
      await session.close();
    } finally {
      await this.readLoops.get(url);
      this.readLoops.delete(url);
    }

    this.emit("relay:disconnected", url);
  }

  /**
   * Get connected relays
   */
  getRelays(): string[] {
    return Array.from(this.sessions.keys());
  }

  hasRelay(url: string): boolean {
    return this.sessions.has(url);
  }

  /**
   * Send an event to every connected relay, or to the given ones.
   * Relays that already received it are not rolled back when others fail.
   *
   * @returns URLs the event was delivered to
   */
  async publish(event: Event, targetRelays?: string[]): Promise<string[]> {
    const sessions = this.targets(targetRelays);
    const { delivered, failures } = await this.broadcast(sessions, formatEventMessage(event));

    if (failures.size > 0) {
      throw new RelayFanoutError("publish", delivered, failures);
    }
    return delivered;
  }

  /**
   * Send a REQ to every connected relay, or to the given ones
   *
   * @returns the subscription id
   */
  async subscribe(
    filters: ReqFilter[],
    subscriptionId?: string,
    targetRelays?: string[]
  ): Promise<string> {
    const subscription = await this.openSubscription(filters, subscriptionId, targetRelays);
    return subscription.id;
  }

  /**
   * Send CLOSE to the relays that received the REQ (every connected relay
   * for an unknown id) and forget the subscription
   */
  async unsubscribe(subscriptionId: string): Promise<void> {
    const subscription = this.matcher.remove(subscriptionId);
    const sessions = subscription
      ? subscription.relayUrls.flatMap((url) => {
          const session = this.sessions.get(url);
          return session ? [session] : [];
        })
      : Array.from(this.sessions.values());
    if (sessions.length === 0) return;

    const { delivered, failures } = await this.broadcast(
      sessions,
      formatCloseMessage(subscriptionId)
    );

    if (delivered.length === 0) {
      throw new RelayFanoutError("unsubscribe", delivered, failures);
    }
    for (const [url, error] of failures) {
      console.warn(`Failed to unsubscribe ${subscriptionId} from ${url}: ${error.message}`);
    }
  }

  /**
   * One-shot query: subscribe, wait until every relay sent EOSE or the
   * deadline passed, unsubscribe, and return the deduplicated events.
   * Relays that missed the deadline are listed in `timedOut`.
   */
  async collectEvents(filters: ReqFilter[], opts: CollectOpts = {}): Promise<CollectionResult> {
    const timeoutMs = opts.timeoutMs ?? this.config.eoseTimeoutMs ?? DEFAULT_EOSE_TIMEOUT_MS;
    const verify = opts.verify ?? true;

    const subscription = await this.openSubscription(filters, opts.subscriptionId);
    const { settled, timedOut } = await subscription.waitSettled(timeoutMs);

    try {
      await this.unsubscribe(subscription.id);
    } catch (error) {
      console.warn(`Failed to close subscription ${subscription.id}:`, toError(error).message);
    }

    const events: Event[] = [];
    const ids = new Set<string>();
    for (const event of extractEvents(subscription.drain())) {
      if (ids.has(event.id) || !matchFilters(event, filters)) continue;
      if (verify && !isVerifiedEvent(event)) {
        console.warn(`Dropping event ${event.id} with an invalid signature`);
        continue;
      }
      ids.add(event.id);
      events.push(event);
    }

    if (timedOut.length > 0) {
      console.warn(
        `No EOSE within ${timeoutMs}ms from ${timedOut.join(", ")}; returning partial results`
      );
    }

    return { events, settled, timedOut };
  }

  /**
   * Events matching the filters from every connected relay
   */
  async getEventsOf(filters: ReqFilter[], opts: CollectOpts = {}): Promise<Event[]> {
    const { events } = await this.collectEvents(filters, opts);
    return events;
  }

  /**
   * Live subscription: stored and new events arrive through async iteration
   * until the handle is closed. Duplicates across relays are delivered once.
   */
  async stream(
    filters: ReqFilter[],
    opts: Pick<CollectOpts, "verify" | "subscriptionId"> = {}
  ): Promise<SubscriptionHandle> {
    const verify = opts.verify ?? true;
    const subscription = await this.openSubscription(filters, opts.subscriptionId);
    const seen = new Set<string>();

    const accept = (event: Event) => {
      if (seen.has(event.id) || !matchFilters(event, filters)) return;
      if (verify && !isVerifiedEvent(event)) return;
      seen.add(event.id);
      handle.push(event);
    };

    const listener = (_url: string, subscriptionId: string, event: Event) => {
      if (subscriptionId !== subscription.id) return;
      subscription.drain();
      accept(event);
    };

    const handle = new LiveSubscription(subscription.id, async () => {
      this.off("event", listener);
      await this.unsubscribe(subscription.id);
    });

    this.on("event", listener);
    // frames that arrived while the REQ was being sent
    for (const event of extractEvents(subscription.drain())) {
      accept(event);
    }
    return handle;
  }

  /**
   * Disconnect from all relays and cleanup
   */
  async disconnect(): Promise<void> {
    const results = await Promise.allSettled(
      this.getRelays().map((url) => this.removeRelay(url))
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.warn("Failed to close relay:", toError(result.reason).message);
      }
    }
    for (const subscription of Array.from(this.matcher.values())) {
      this.matcher.remove(subscription.id);
    }
  }

  private async openSubscription(
    filters: ReqFilter[],
    subscriptionId = generateSubscriptionId(),
    targetRelays?: string[]
  ): Promise<Subscription> {
    if (filters.length === 0) {
      throw new InvalidInputError("At least one filter is required");
    }
    if (this.matcher.get(subscriptionId)) {
      throw new InvalidInputError(`Subscription ${subscriptionId} is already open`);
    }

    const sessions = this.targets(targetRelays);
    const subscription = new Subscription(
      subscriptionId,
      filters,
      sessions.map((session) => session.url)
    );
    // registered before sending so an early EOSE is not missed
    this.matcher.add(subscription);

    const { delivered, failures } = await this.broadcast(
      sessions,
      formatReqMessage(subscriptionId, filters)
    );

    for (const [url, error] of failures) {
      subscription.dropRelay(url);
      console.warn(`Failed to send subscription to ${url}: ${error.message}`);
    }

    if (delivered.length === 0) {
      this.matcher.remove(subscriptionId);
      throw new RelayFanoutError("subscribe", delivered, failures);
    }

    return subscription;
  }

  private targets(targetRelays?: string[]): RelaySession[] {
    const sessions = targetRelays
      ? targetRelays.map((url) => {
          const session = this.sessions.get(url);
          if (!session) throw new RelayNotFoundError(url);
          return session;
        })
      : Array.from(this.sessions.values());

    if (sessions.length === 0) {
      throw new NoRelaysError();
    }
    return sessions;
  }

  private async broadcast(sessions: RelaySession[], frame: string): Promise<FanoutResult> {
    const results = await Promise.allSettled(sessions.map((session) => session.send(frame)));

    const delivered: string[] = [];
    const failures = new Map<string, Error>();
    results.forEach((result, i) => {
      const url = sessions[i].url;
      if (result.status === "fulfilled") {
        delivered.push(url);
      } else {
        failures.set(url, toError(result.reason));
      }
    });
    return { delivered, failures };
  }

  private async readLoop(session: RelaySession): Promise<void> {
    try {
      for (;;) {
        const raw = await session.receive();
        if (raw === null) break;
        try {
          this.handleFrame(session.url, raw);
        } catch (error) {
          // a throwing listener must not take the relay down with it
          console.error(`Error handling frame from ${session.url}:`, toError(error).message);
        }
      }
    } catch (error) {
      this.emit("relay:error", session.url, toError(error));
    }

    // Closed by the relay rather than by removeRelay
    if (this.sessions.get(session.url) === session) {
      this.sessions.delete(session.url);
      this.readLoops.delete(session.url);
      this.matcher.dropRelay(session.url);
      try {
        await session.close();
      } catch (error) {
        console.warn(`Failed to close ${session.url}:`, toError(error).message);
      }
      this.emit("relay:disconnected", session.url);
    }
  }

  private handleFrame(url: string, raw: string): void {
    const message = parseRelayMessage(raw);
    if (!message) {
      console.warn(`Ignoring unrecognized frame from ${url}: ${raw.slice(0, 80)}`);
      return;
    }

    this.emit("relay:message", url, message);

    switch (message.type) {
      case "EVENT": {
        const subscription = this.matcher.route(url, message);
        if (!subscription) return;
        const [event] = extractEvents([message.raw]);
        if (event) {
          this.emit("event", url, subscription.id, event);
        } else {
          console.warn(`Ignoring malformed event from ${url}`);
        }
        break;
      }
      case "EOSE":
        this.matcher.route(url, message);
        this.emit("eose", url, message.subscriptionId);
        break;
      case "OK":
        this.emit("ok", url, message.eventId, message.accepted, message.message);
        break;
      case "NOTICE":
        this.emit("notice", url, message.message);
        break;
      case "CLOSED":
        // a relay that closed the subscription will not send EOSE
        this.matcher.get(message.subscriptionId)?.settle(url);
        this.emit("closed", url, message.subscriptionId, message.message);
        break;
    }
  }
}

/**
 * Create a RelayPool from configuration, by default read from the environment.
 * Call connect() to open the configured relays.
 */
export function createClient(
  config: Partial<NostrConfig> = loadConfig(),
  channelFactory?: ChannelFactory
): RelayPool {
  return new RelayPool(config, channelFactory);
}
