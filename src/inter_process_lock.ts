// src/inter_process_lock.ts

import { EventEmitter } from "events";
import { BusConnection, Unsubscribe } from "./bus";
import { BusServiceError, ConfigurationError } from "./errors";
import { isValidServiceName } from "./identity";
import { createLogger, Logger } from "./logger";

export const LOCK_NAME_PREFIX = "org.kde.private.lock-";

/**
 * A lock shared by every process on a bus, built on queued name
 * ownership: whoever owns the lock's name holds the lock, and the bus
 * hands the name to the next queued process when it is released.
 *
 * Events:
 * - 'lockGranted': emitted when this connection becomes the owner
 *
 * @example
 * ```typescript
 * const lock = new InterProcessLock(connection, "myresource");
 * await lock.lock();
 * try {
 *   // exclusive section
 * } finally {
 *   await lock.unlock();
 * }
 * ```
 */
export class InterProcessLock extends EventEmitter {
  readonly resource: string;
  readonly serviceName: string;

  private readonly connection: BusConnection;
  private readonly log: Logger;
  private locked = false;
  private stopWatching?: Unsubscribe;
  private pending?: Promise<void>;
  private cancelWait?: (reason: Error) => void;

  constructor(connection: BusConnection, resource: string) {
    super();
    const serviceName = LOCK_NAME_PREFIX + resource;
    if (resource.length === 0 || !isValidServiceName(serviceName)) {
      throw new ConfigurationError(`Invalid lock resource: ${resource}`, {
        resource,
      });
    }

    this.connection = connection;
    this.resource = resource;
    this.serviceName = serviceName;
    this.log = createLogger("InterProcessLock", serviceName);
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Resolves once this connection holds the lock. Concurrent calls share
   * the same wait.
   */
  lock(): Promise<void> {
    if (this.locked) {
      return Promise.resolve();
    }
    if (!this.pending) {
      this.pending = this.acquire().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /**
   * Releases the lock, or leaves the queue when it was still waiting.
   */
  async unlock(): Promise<void> {
    this.stopWatching?.();
    this.stopWatching = undefined;
    this.cancelWait?.(
      new BusServiceError("Lock was released while waiting", "LOCK_CANCELLED", {
        resource: this.resource,
      }),
    );
    this.cancelWait = undefined;
    this.locked = false;
    await this.connection.releaseName(this.serviceName);
    this.log.debug("Lock released");
  }

  private async acquire(): Promise<void> {
    let granted = false;
    let wake: (() => void) | undefined;
    let abort: ((reason: Error) => void) | undefined;
    let cancelled: Error | undefined;
    this.stopWatching = this.connection.watchNameOwner(
      this.serviceName,
      (newOwner) => {
        if (newOwner === this.connection.uniqueName) {
          granted = true;
          wake?.();
        }
      },
    );
    // unlock() may land while the name request is still in flight.
    this.cancelWait = (reason) => {
      cancelled = reason;
      abort?.(reason);
    };

    try {
      const reply = await this.connection.requestName(this.serviceName);
      if (!cancelled && reply === "inQueue" && !granted) {
        this.log.debug("Waiting for lock");
        await new Promise<void>((resolve, reject) => {
          wake = resolve;
          abort = reject;
        });
      }
    } finally {
      this.stopWatching?.();
      this.stopWatching = undefined;
      this.cancelWait = undefined;
    }

    if (cancelled) {
      throw cancelled;
    }
    this.locked = true;
    this.log.debug("Lock granted");
    this.emit("lockGranted");
  }
}
