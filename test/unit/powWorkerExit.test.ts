import { describe, it, expect, vi } from "vitest";
import { mineEventPow } from "../../src/pow.js";

// Workers that die during startup, before they can post a nonce
vi.mock("worker_threads", async (importOriginal) => {
  const actual = await importOriginal<typeof import("worker_threads")>();
  const { EventEmitter } = await import("events");

  class CrashingWorker extends EventEmitter {
    constructor() {
      super();
      setImmediate(() => this.emit("exit", 1));
    }

    terminate(): Promise<number> {
      return Promise.resolve(1);
    }
  }

  return { ...actual, Worker: CrashingWorker };
});

const template = {
  pubkey: "79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798",
  kind: 1,
  content: "never mined",
};

describe("mineEventPow worker exit", () => {
  it("rejects when a worker exits without a result", async () => {
    await expect(mineEventPow(template, 8, { threads: 2 })).rejects.toThrow(
      "PoW worker exited with code 1 before finding a nonce"
    );
  });
});
