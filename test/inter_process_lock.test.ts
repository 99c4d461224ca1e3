// test/inter_process_lock.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  ConfigurationError,
  InMemoryBus,
  InterProcessLock,
  loggerConfig,
} from "../src";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("InterProcessLock", () => {
  let bus: InMemoryBus;

  beforeEach(() => {
    loggerConfig.level = "none";
    bus = new InMemoryBus();
  });

  afterEach(async () => {
    await bus.close();
    loggerConfig.reset();
  });

  it("derives its bus name from the resource", async () => {
    const lock = new InterProcessLock(await bus.connect(), "settings");

    expect(lock.serviceName).toBe("org.kde.private.lock-settings");
    expect(lock.resource).toBe("settings");
  });

  it("rejects resources that make an invalid name", async () => {
    const connection = await bus.connect();

    expect(() => new InterProcessLock(connection, "")).toThrow(ConfigurationError);
    expect(() => new InterProcessLock(connection, "two words")).toThrow(
      "Invalid lock resource: two words",
    );
  });

  it("grants a free lock immediately", async () => {
    const connection = await bus.connect();
    const lock = new InterProcessLock(connection, "settings");
    const granted = vi.fn();
    lock.on("lockGranted", granted);

    await lock.lock();

    expect(lock.isLocked()).toBe(true);
    expect(granted).toHaveBeenCalledTimes(1);
    expect(bus.getNameOwner("org.kde.private.lock-settings")).toBe(
      connection.uniqueName,
    );
  });

  it("shares one acquisition between concurrent calls", async () => {
    const lock = new InterProcessLock(await bus.connect(), "settings");

    const first = lock.lock();
    const second = lock.lock();

    expect(second).toBe(first);
    await first;
  });

  it("hands the lock over when the holder unlocks", async () => {
    const holder = new InterProcessLock(await bus.connect(), "settings");
    const waiterConnection = await bus.connect();
    const waiter = new InterProcessLock(waiterConnection, "settings");
    await holder.lock();

    const waiting = waiter.lock();
    await flush();
    expect(waiter.isLocked()).toBe(false);

    await holder.unlock();
    await waiting;

    expect(holder.isLocked()).toBe(false);
    expect(waiter.isLocked()).toBe(true);
    expect(bus.getNameOwner("org.kde.private.lock-settings")).toBe(
      waiterConnection.uniqueName,
    );
  });

  it("hands the lock over when the holder's connection closes", async () => {
    const holderConnection = await bus.connect();
    const holder = new InterProcessLock(holderConnection, "settings");
    const waiter = new InterProcessLock(await bus.connect(), "settings");
    await holder.lock();

    const waiting = waiter.lock();
    await flush();
    await holderConnection.disconnect();
    await waiting;

    expect(waiter.isLocked()).toBe(true);
  });

  it("leaves the queue when unlocked while waiting", async () => {
    const holderConnection = await bus.connect();
    const holder = new InterProcessLock(holderConnection, "settings");
    const waiter = new InterProcessLock(await bus.connect(), "settings");
    await holder.lock();

    const waiting = waiter.lock();
    await flush();
    const cancelled = expect(waiting).rejects.toMatchObject({
      code: "LOCK_CANCELLED",
    });
    await waiter.unlock();
    await cancelled;

    expect(bus.getNameQueue("org.kde.private.lock-settings")).toEqual([
      holderConnection.uniqueName,
    ]);
  });

  it("rejects a lock that is unlocked before the bus replies", async () => {
    const holderConnection = await bus.connect();
    const holder = new InterProcessLock(holderConnection, "settings");
    const waiter = new InterProcessLock(await bus.connect(), "settings");
    await holder.lock();

    const waiting = waiter.lock();
    const cancelled = expect(waiting).rejects.toMatchObject({
      code: "LOCK_CANCELLED",
    });
    await waiter.unlock();
    await cancelled;

    expect(waiter.isLocked()).toBe(false);
    expect(bus.getNameQueue("org.kde.private.lock-settings")).toEqual([
      holderConnection.uniqueName,
    ]);
  });
});
