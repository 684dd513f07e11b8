import { afterEach, describe, expect, it, vi } from "vitest";
import { TaskQueue } from "./task-queue.js";

describe("TaskQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("delivers items in push order", async () => {
    const queue = new TaskQueue<string>();
    queue.push("bash");
    queue.push("curl");

    expect(await queue.pop(10)).toBe("bash");
    expect(await queue.pop(10)).toBe("curl");
    expect(queue.isEmpty()).toBe(true);
  });

  it("hands a pushed item to a waiting consumer", async () => {
    const queue = new TaskQueue<string>();
    const pending = queue.pop(1000);

    queue.push("vim");

    expect(await pending).toBe("vim");
    expect(queue.isEmpty()).toBe(true);
  });

  it("resolves null when the timeout expires", async () => {
    vi.useFakeTimers();
    const queue = new TaskQueue<string>();
    const pending = queue.pop(1000);

    vi.advanceTimersByTime(1000);

    expect(await pending).toBeNull();
  });

  it("keeps items pushed after a timed-out pop", async () => {
    vi.useFakeTimers();
    const queue = new TaskQueue<string>();
    const pending = queue.pop(50);
    vi.advanceTimersByTime(50);
    await pending;

    queue.push("nano");

    expect(queue.isEmpty()).toBe(false);
    expect(await queue.pop(50)).toBe("nano");
  });

  it("releases waiting consumers on close", async () => {
    const queue = new TaskQueue<string>();
    const pending = queue.pop(60000);

    queue.close();

    expect(await pending).toBeNull();
  });
});
