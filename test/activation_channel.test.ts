// test/activation_channel.test.ts

import { describe, it, expect, beforeEach, afterEach, vi, Mock } from "vitest";
import { ActivationChannel, CommandLineRequest, loggerConfig } from "../src";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ActivationChannel", () => {
  const originalHandler = loggerConfig.handler;
  let logged: Mock;

  beforeEach(() => {
    logged = vi.fn();
    loggerConfig.handler = logged;
  });

  afterEach(() => {
    loggerConfig.handler = originalHandler;
  });

  it("delivers synchronously in direct mode", () => {
    const channel = new ActivationChannel("direct");
    const received: string[] = [];
    channel.on("open", (request) => {
      received.push(...request.uris);
    });

    channel.deliver({ kind: "open", uris: ["file:///a.txt"], platformData: {} });

    expect(received).toEqual(["file:///a.txt"]);
  });

  it("defers delivery in queued mode", async () => {
    const channel = new ActivationChannel("queued");
    const listener = vi.fn();
    const delivered = vi.fn();
    channel.on("activate", listener);

    channel.deliver({ kind: "activate", platformData: {} }, delivered);

    expect(listener).not.toHaveBeenCalled();
    expect(delivered).not.toHaveBeenCalled();

    await flush();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(delivered).toHaveBeenCalledTimes(1);
  });

  it("calls listeners in registration order", () => {
    const channel = new ActivationChannel();
    const order: number[] = [];
    channel.on("activate", () => {
      order.push(1);
    });
    channel.on("activate", () => {
      order.push(2);
    });

    channel.deliver({ kind: "activate", platformData: {} });

    expect(order).toEqual([1, 2]);
  });

  it("routes requests by kind", () => {
    const channel = new ActivationChannel();
    const commandLines: CommandLineRequest[] = [];
    const activations = vi.fn();
    channel.on("commandLine", (request) => {
      commandLines.push(request);
    });
    channel.on("activate", activations);

    channel.deliver({
      kind: "commandLine",
      arguments: ["app", "--foo"],
      workingDirectory: "/tmp",
      platformData: {},
    });

    expect(commandLines).toHaveLength(1);
    expect(commandLines[0].arguments).toEqual(["app", "--foo"]);
    expect(activations).not.toHaveBeenCalled();
  });

  it("keeps delivering after a listener throws", () => {
    const channel = new ActivationChannel();
    const second = vi.fn();
    channel.on("activate", () => {
      throw new Error("boom");
    });
    channel.on("activate", second);

    channel.deliver({ kind: "activate", platformData: {} });

    expect(second).toHaveBeenCalledTimes(1);
    expect(logged).toHaveBeenCalledWith(
      expect.objectContaining({
        level: "error",
        message: "Activation listener failed",
      }),
    );
  });

  it("logs a rejected async listener", async () => {
    const channel = new ActivationChannel();
    channel.on("activate", async () => {
      throw new Error("async boom");
    });

    channel.deliver({ kind: "activate", platformData: {} });
    await flush();

    const entry = logged.mock.calls
      .map(([e]) => e)
      .find((e) => e.level === "error");
    expect(entry?.error?.message).toBe("async boom");
  });

  it("removes a listener through the returned function", () => {
    const channel = new ActivationChannel();
    const listener = vi.fn();
    const off = channel.on("activate", listener);

    off();
    channel.deliver({ kind: "activate", platformData: {} });

    expect(listener).not.toHaveBeenCalled();
    expect(channel.listenerCount("activate")).toBe(0);
  });

  it("runs once() listeners a single time", () => {
    const channel = new ActivationChannel();
    const listener = vi.fn();
    channel.once("quit", listener);

    channel.deliver({ kind: "quit" });
    channel.deliver({ kind: "quit" });

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("clears every listener", () => {
    const channel = new ActivationChannel();
    channel.on("activate", vi.fn());
    channel.on("open", vi.fn());

    channel.removeAllListeners();

    expect(channel.listenerCount("activate")).toBe(0);
    expect(channel.listenerCount("open")).toBe(0);
  });

  it("still signals delivery when nothing listens", () => {
    const channel = new ActivationChannel();
    const delivered = vi.fn();

    channel.deliver({ kind: "activate", platformData: {} }, delivered);

    expect(delivered).toHaveBeenCalledTimes(1);
  });
});
