import { describe, it, expect } from "vitest";
import {
  Subscription,
  SubscriptionMatcher,
  extractEvents,
  parseRelayMessage,
} from "../../src/subscription.js";
import { finalizeEvent } from "../../src/event.js";
import { Identity } from "../../src/keys.js";

const identity = Identity.fromSecretKey("00".repeat(31) + "01");
const event = finalizeEvent({ kind: 1, content: "hello", created_at: 1000 }, identity);
const eventFrame = JSON.stringify(["EVENT", "sub", event]);

describe("parseRelayMessage", () => {
  it("classifies each relay frame type", () => {
    expect(parseRelayMessage(eventFrame)).toEqual({
      type: "EVENT",
      subscriptionId: "sub",
      raw: eventFrame,
    });
    expect(parseRelayMessage('["EOSE","sub"]')).toEqual({ type: "EOSE", subscriptionId: "sub" });
    expect(parseRelayMessage('["OK","abc",true,"stored"]')).toEqual({
      type: "OK",
      eventId: "abc",
      accepted: true,
      message: "stored",
    });
    expect(parseRelayMessage('["NOTICE","slow down"]')).toEqual({
      type: "NOTICE",
      message: "slow down",
    });
    expect(parseRelayMessage('["CLOSED","sub","auth-required: log in"]')).toEqual({
      type: "CLOSED",
      subscriptionId: "sub",
      message: "auth-required: log in",
    });
  });

  it("defaults a missing OK message to empty", () => {
    expect(parseRelayMessage('["OK","abc",false]')).toEqual({
      type: "OK",
      eventId: "abc",
      accepted: false,
      message: "",
    });
  });

  it("returns null for malformed or unknown frames", () => {
    expect(parseRelayMessage("not json")).toBeNull();
    expect(parseRelayMessage("{}")).toBeNull();
    expect(parseRelayMessage('["EOSE"]')).toBeNull();
    expect(parseRelayMessage('["OK","abc","yes"]')).toBeNull();
    expect(parseRelayMessage('["AUTH","challenge"]')).toBeNull();
  });
});

describe("extractEvents", () => {
  it("skips malformed frames", () => {
    const events = extractEvents([eventFrame, '["EVENT","sub",{"id":"nope"}]']);
    expect(events).toHaveLength(1);
    expect(events[0].id).toBe(event.id);
  });

  it("skips frames that are not EVENT", () => {
    expect(extractEvents(['["EOSE","sub"]', "garbage"])).toEqual([]);
  });
});

describe("Subscription", () => {
  it("stores identical frames once and drains in order", () => {
    const subscription = new Subscription("sub", [{}], ["wss://a"]);
    expect(subscription.addFrame("one")).toBe(true);
    expect(subscription.addFrame("two")).toBe(true);
    expect(subscription.addFrame("one")).toBe(false);
    expect(subscription.drain()).toEqual(["one", "two"]);
    expect(subscription.drain()).toEqual([]);
  });

  it("forgets drained frames", () => {
    const subscription = new Subscription("sub", [{}], ["wss://a"]);
    for (let i = 0; i < 200; i++) {
      subscription.addFrame(`frame-${i}`);
      subscription.drain();
    }

    expect(subscription.addFrame("frame-0")).toBe(true);
    expect(subscription.drain()).toEqual(["frame-0"]);
  });

  it("tracks per-relay EOSE state", () => {
    const subscription = new Subscription("sub", [{}], ["wss://a", "wss://b"]);
    subscription.settle("wss://a");
    expect(subscription.stateOf("wss://a")).toBe("settled");
    expect(subscription.stateOf("wss://b")).toBe("awaiting");
    expect(subscription.isSettled()).toBe(false);
    subscription.settle("wss://b");
    expect(subscription.isSettled()).toBe(true);
  });

  it("ignores EOSE from relays it was not sent to", () => {
    const subscription = new Subscription("sub", [{}], ["wss://a"]);
    subscription.settle("wss://other");
    expect(subscription.relayUrls).toEqual(["wss://a"]);
  });

  it("resolves waitSettled once every relay settles", async () => {
    const subscription = new Subscription("sub", [{}], ["wss://a", "wss://b"]);
    const wait = subscription.waitSettled(10000);
    subscription.settle("wss://a");
    subscription.settle("wss://b");
    await expect(wait).resolves.toEqual({ settled: ["wss://a", "wss://b"], timedOut: [] });
  });

  it("reports relays still awaiting at the deadline", async () => {
    const subscription = new Subscription("sub", [{}], ["wss://a", "wss://b"]);
    subscription.settle("wss://a");
    await expect(subscription.waitSettled(20)).resolves.toEqual({
      settled: ["wss://a"],
      timedOut: ["wss://b"],
    });
  });

  it("stops waiting on a dropped relay", async () => {
    const subscription = new Subscription("sub", [{}], ["wss://a", "wss://b"]);
    subscription.settle("wss://a");
    const wait = subscription.waitSettled(10000);
    subscription.dropRelay("wss://b");
    await expect(wait).resolves.toEqual({ settled: ["wss://a"], timedOut: [] });
  });

  it("is settled immediately with no relays", async () => {
    const subscription = new Subscription("sub", [{}]);
    await expect(subscription.waitSettled(10000)).resolves.toEqual({
      settled: [],
      timedOut: [],
    });
  });
});

describe("SubscriptionMatcher", () => {
  it("routes EVENT frames into the subscription buffer", () => {
    const matcher = new SubscriptionMatcher();
    const subscription = new Subscription("sub", [{}], ["wss://a"]);
    matcher.add(subscription);

    const message = { type: "EVENT" as const, subscriptionId: "sub", raw: eventFrame };
    expect(matcher.route("wss://a", message)).toBe(subscription);
    expect(matcher.route("wss://a", message)).toBeUndefined();
    expect(subscription.drain()).toEqual([eventFrame]);
  });

  it("ignores frames for unknown subscriptions or relays", () => {
    const matcher = new SubscriptionMatcher();
    matcher.add(new Subscription("sub", [{}], ["wss://a"]));

    expect(
      matcher.route("wss://a", { type: "EVENT", subscriptionId: "other", raw: eventFrame })
    ).toBeUndefined();
    expect(
      matcher.route("wss://b", { type: "EVENT", subscriptionId: "sub", raw: eventFrame })
    ).toBeUndefined();
    expect(matcher.route("wss://a", { type: "NOTICE", message: "hi" })).toBeUndefined();
  });

  it("settles on EOSE", () => {
    const matcher = new SubscriptionMatcher();
    const subscription = new Subscription("sub", [{}], ["wss://a"]);
    matcher.add(subscription);
    matcher.route("wss://a", { type: "EOSE", subscriptionId: "sub" });
    expect(subscription.isSettled()).toBe(true);
  });

  it("drops a relay from every subscription", () => {
    const matcher = new SubscriptionMatcher();
    const first = new Subscription("one", [{}], ["wss://a", "wss://b"]);
    const second = new Subscription("two", [{}], ["wss://a"]);
    matcher.add(first);
    matcher.add(second);
    matcher.dropRelay("wss://a");
    expect(first.relayUrls).toEqual(["wss://b"]);
    expect(second.relayUrls).toEqual([]);
  });
});
