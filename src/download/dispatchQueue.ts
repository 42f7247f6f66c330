import { HostThrottle } from "./hostThrottle";

export interface WorkItem {
  requestedUrl: string;
  canonicalUrl: string;
  host: string;
}

export type TakeResult = { kind: "ready"; item: WorkItem } | { kind: "wait"; waitMs: number } | { kind: "empty" };

/**
 * Pending work grouped by host. `take` rotates across hosts and only hands
 * out items whose host is past its politeness delay, so a throttled host
 * never blocks work for the others.
 */
export class DispatchQueue {
  private readonly byHost = new Map<string, WorkItem[]>();
  private count = 0;

  push(item: WorkItem): void {
    const items = this.byHost.get(item.host);
    if (items) {
      items.push(item);
    } else {
      this.byHost.set(item.host, [item]);
    }
    this.count += 1;
  }

  get length(): number {
    return this.count;
  }

  get hostCount(): number {
    return this.byHost.size;
  }

  take(throttle: HostThrottle, now: number): TakeResult {
    if (this.count === 0) {
      return { kind: "empty" };
    }

    let minWait = Number.POSITIVE_INFINITY;
    for (const [host, items] of this.byHost) {
      const waitMs = throttle.waitTime(host, now);
      if (waitMs > 0) {
        minWait = Math.min(minWait, waitMs);
        continue;
      }

      const item = items.shift();
      // Re-inserting moves the host to the back of the rotation.
      this.byHost.delete(host);
      if (items.length > 0) {
        this.byHost.set(host, items);
      }
      if (item) {
        this.count -= 1;
        return { kind: "ready", item };
      }
    }

    return { kind: "wait", waitMs: minWait };
  }
}
