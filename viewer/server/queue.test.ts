import { describe, expect, it, vi } from "vitest";
import { EventQueue } from "./queue";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("EventQueue", () => {
  it("handles events one at a time in post order", async () => {
    const log: string[] = [];
    const queue = new EventQueue<number>(async (n) => {
      log.push(`start ${n}`);
      await sleep(n === 1 ? 20 : 1);
      log.push(`end ${n}`);
    }, vi.fn());

    queue.post(1);
    queue.post(2);
    queue.post(3);
    await queue.idle();

    expect(log).toEqual(["start 1", "end 1", "start 2", "end 2", "start 3", "end 3"]);
  });

  it("never runs a handler inside post", async () => {
    const handler = vi.fn();
    const queue = new EventQueue<string>(handler, vi.fn());

    queue.post("a");
    expect(handler).not.toHaveBeenCalled();
    expect(queue.size).toBe(1);
    await queue.idle();
    expect(handler).toHaveBeenCalledWith("a");
    expect(queue.size).toBe(0);
  });

  it("reports handler failures and keeps going", async () => {
    const seen: string[] = [];
    const onError = vi.fn();
    const queue = new EventQueue<string>((event) => {
      if (event === "bad") throw new Error("boom");
      seen.push(event);
    }, onError);

    queue.post("a");
    queue.post("bad");
    queue.post("b");
    await queue.idle();

    expect(seen).toEqual(["a", "b"]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(new Error("boom"), "bad");
  });

  it("runs events posted by a handler after the current one", async () => {
    const log: string[] = [];
    const queue: EventQueue<string> = new EventQueue<string>((event) => {
      log.push(event);
      if (event === "first") queue.post("nested");
      log.push(`${event} done`);
    }, vi.fn());

    queue.post("first");
    queue.post("second");
    await queue.idle();

    expect(log).toEqual(["first", "first done", "second", "second done", "nested", "nested done"]);
  });

  it("is idle when nothing was posted", async () => {
    const queue = new EventQueue<number>(vi.fn(), vi.fn());
    await expect(queue.idle()).resolves.toBeUndefined();
  });

  it("starts a new drain after going idle", async () => {
    const handler = vi.fn();
    const queue = new EventQueue<number>(handler, vi.fn());

    queue.post(1);
    await queue.idle();
    queue.post(2);
    await queue.idle();

    expect(handler.mock.calls).toEqual([[1], [2]]);
  });
});
