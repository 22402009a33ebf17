import { describe, it, expect } from "@jest/globals";
import { HubInbox } from "../src/inbox.js";

describe("HubInbox", () => {
  it("should reject a capacity below one", () => {
    expect(() => new HubInbox<string, number>(0)).toThrow(RangeError);
    expect(() => new HubInbox<string, number>(1.5)).toThrow(RangeError);
    expect(() => new HubInbox<string, number>(1, 0)).toThrow(
      "requestCapacity must be a positive integer, got 0"
    );
  });

  it("should reject the newest broadcast when the lane is full", async () => {
    const inbox = new HubInbox<string, number>(2);

    expect(inbox.offerBroadcast(1)).toBe(true);
    expect(inbox.offerBroadcast(2)).toBe(true);
    expect(inbox.offerBroadcast(3)).toBe(false);
    expect(inbox.pendingBroadcasts).toBe(2);

    expect(await inbox.next()).toEqual({ lane: "broadcast", item: 1 });
    expect(await inbox.next()).toEqual({ lane: "broadcast", item: 2 });
  });

  it("should bound queued requests per source", async () => {
    const inbox = new HubInbox<string, number>(1, 2);
    const flooder = {};
    const other = {};

    const accepted = ["r1", "r2", "r3", "r4"].map((item) => inbox.offerRequest(flooder, item));

    expect(accepted).toEqual([true, true, false, false]);
    expect(inbox.pendingRequests(flooder)).toBe(2);
    expect(inbox.offerRequest(other, "o1")).toBe(true);
    expect(inbox.pendingControl).toBe(3);

    expect(await inbox.next()).toEqual({ lane: "control", item: "r1" });
    expect(inbox.pendingRequests(flooder)).toBe(1);
    expect(inbox.offerRequest(flooder, "r5")).toBe(true);
    expect(inbox.offerRequest(flooder, "r6")).toBe(false);
  });

  it("should always accept lifecycle items next to capped requests", async () => {
    const inbox = new HubInbox<string, number>(1, 1);
    const source = {};
    inbox.offerRequest(source, "subscribe");

    expect(inbox.offerRequest(source, "subscribe again")).toBe(false);
    expect(inbox.postControl("unregister")).toBe(true);

    expect(await inbox.next()).toEqual({ lane: "control", item: "subscribe" });
    expect(await inbox.next()).toEqual({ lane: "control", item: "unregister" });
    expect(inbox.pendingRequests(source)).toBe(0);
  });

  it("should alternate lanes when both have items", async () => {
    const inbox = new HubInbox<string, number>(10);
    inbox.postControl("a");
    inbox.postControl("b");
    inbox.offerBroadcast(1);
    inbox.offerBroadcast(2);

    const order: unknown[] = [];
    for (let i = 0; i < 4; i++) order.push(await inbox.next());

    expect(order).toEqual([
      { lane: "control", item: "a" },
      { lane: "broadcast", item: 1 },
      { lane: "control", item: "b" },
      { lane: "broadcast", item: 2 },
    ]);
  });

  it("should hand an item straight to a waiting consumer", async () => {
    const inbox = new HubInbox<string, number>(1);
    const pending = inbox.next();

    expect(inbox.offerBroadcast(7)).toBe(true);
    expect(inbox.pendingBroadcasts).toBe(0);
    // The lane is free again for the next item
    expect(inbox.offerBroadcast(8)).toBe(true);

    expect(await pending).toEqual({ lane: "broadcast", item: 7 });
  });

  it("should allow a single consumer only", async () => {
    const inbox = new HubInbox<string, number>(1);
    const first = inbox.next();

    await expect(inbox.next()).rejects.toThrow("HubInbox supports a single consumer");

    inbox.close();
    expect(await first).toBeNull();
  });

  it("should release the consumer and discard items on close", async () => {
    const inbox = new HubInbox<string, number>(5);
    inbox.postControl("a");
    inbox.offerBroadcast(1);

    const source = {};
    inbox.offerRequest(source, "r1");

    inbox.close();

    expect(inbox.isClosed).toBe(true);
    expect(inbox.pendingControl).toBe(0);
    expect(inbox.pendingRequests(source)).toBe(0);
    expect(inbox.offerRequest(source, "r2")).toBe(false);
    expect(inbox.pendingBroadcasts).toBe(0);
    expect(await inbox.next()).toBeNull();
    expect(inbox.postControl("b")).toBe(false);
    expect(inbox.offerBroadcast(2)).toBe(false);
  });
});
