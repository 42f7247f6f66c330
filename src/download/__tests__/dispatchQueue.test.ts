import { describe, expect, test } from "vitest";
import { FakeTimeSource } from "../../__tests__/helpers";
import { DispatchQueue, WorkItem } from "../dispatchQueue";
import { HostThrottle } from "../hostThrottle";
import { SeenSet } from "../seenSet";

function item(host: string, name: string): WorkItem {
  const url = `https://${host}/${name}.pdf`;
  return { requestedUrl: url, canonicalUrl: url, host };
}

describe("HostThrottle", () => {
  test("rejects a negative delay", () => {
    expect(() => new HostThrottle(-1)).toThrow("delayMs must be >= 0");
  });

  test("tracks each host independently", () => {
    const throttle = new HostThrottle(500, new FakeTimeSource());
    throttle.reserve("a.example.com", 1_000);

    expect(throttle.waitTime("a.example.com", 1_200)).toBe(300);
    expect(throttle.waitTime("a.example.com", 1_500)).toBe(0);
    expect(throttle.waitTime("b.example.com", 1_200)).toBe(0);
  });
});

describe("DispatchQueue", () => {
  test("reports empty when drained", () => {
    const queue = new DispatchQueue();
    expect(queue.take(new HostThrottle(0), 0)).toEqual({ kind: "empty" });
  });

  test("rotates across hosts", () => {
    const queue = new DispatchQueue();
    queue.push(item("a.example.com", "1"));
    queue.push(item("a.example.com", "2"));
    queue.push(item("b.example.com", "1"));
    const throttle = new HostThrottle(0);

    const order: string[] = [];
    for (let next = queue.take(throttle, 0); next.kind === "ready"; next = queue.take(throttle, 0)) {
      order.push(next.item.canonicalUrl);
    }

    expect(order).toEqual([
      "https://a.example.com/1.pdf",
      "https://b.example.com/1.pdf",
      "https://a.example.com/2.pdf",
    ]);
    expect(queue.length).toBe(0);
  });

  test("skips a throttled host and reports the shortest wait", () => {
    const queue = new DispatchQueue();
    queue.push(item("a.example.com", "1"));
    queue.push(item("b.example.com", "1"));
    const throttle = new HostThrottle(1_000);
    throttle.reserve("a.example.com", 0);
    throttle.reserve("b.example.com", 400);

    expect(queue.take(throttle, 500)).toEqual({ kind: "wait", waitMs: 500 });

    const next = queue.take(throttle, 1_000);
    expect(next.kind === "ready" && next.item.host).toBe("a.example.com");
    expect(queue.length).toBe(1);
    expect(queue.hostCount).toBe(1);
  });
});

describe("SeenSet", () => {
  test("tryAdd admits a key once", () => {
    const seen = new SeenSet();
    expect(seen.tryAdd("https://example.com/a.pdf")).toBe(true);
    expect(seen.tryAdd("https://example.com/a.pdf")).toBe(false);
    expect(seen.tryAdd("https://example.com/b.pdf")).toBe(true);
  });

  test("preloaded keys are known and cannot be added again", () => {
    const seen = new SeenSet(["https://example.com/stored.pdf"]);
    expect(seen.isPreloaded("https://example.com/stored.pdf")).toBe(true);
    expect(seen.tryAdd("https://example.com/stored.pdf")).toBe(false);

    seen.tryAdd("https://example.com/new.pdf");
    expect(seen.isPreloaded("https://example.com/new.pdf")).toBe(false);
  });
});
