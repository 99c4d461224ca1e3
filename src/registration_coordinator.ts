// src/registration_coordinator.ts

import { BusConnection, RequestNameReply } from "./bus";
import {
  BusError,
  BusErrorNames,
  RegistrationError,
  RegistrationErrorKind,
  toError,
} from "./errors";
import {
  MAIN_APPLICATION_PATH,
  objectPathForService,
  ServiceIdentity,
} from "./identity";
import { createLogger, Logger } from "./logger";
import {
  BusExposedHandlers,
  createActivationInterfaces,
  createMainApplicationInterfaces,
  MAIN_APPLICATION_INTERFACE,
} from "./service_adaptor";
import { StartupOptions } from "./startup_options";

export type RegistrationState =
  | "unregistered"
  | "registered"
  | "forwarding"
  | "failed";

/**
 * Configuration for the registration coordinator.
 */
export interface CoordinatorConfig {
  /** How long to wait for a replaced owner to leave the bus (ms). Default: 5000 */
  replaceTimeoutMs: number;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  replaceTimeoutMs: 5000,
};

/**
 * Claims a service name on the bus and resolves contention for it.
 *
 * - The name is free: this process becomes the owner ("registered").
 * - The name is owned and Replace is set: the owner is asked to quit, and
 *   once it has left the claim is retried exactly once.
 * - The name is owned otherwise: "forwarding" for unique services, and
 *   "failed" for multiple-mode services, whose names are per process.
 * - The bus fails: "failed", with an error message.
 *
 * The coordinator never ends the process; what to do with a forwarding or
 * failed result is up to the caller.
 *
 * @example
 * ```typescript
 * const coordinator = new RegistrationCoordinator(connection, receiver);
 * const state = await coordinator.register(identity, options);
 * if (state === "forwarding") {
 *   // hand the command line to the owner
 * }
 * ```
 */
export class RegistrationCoordinator {
  private readonly connection: BusConnection;
  private readonly handlers: BusExposedHandlers;
  private readonly config: CoordinatorConfig;
  private log: Logger;

  private _state: RegistrationState = "unregistered";
  private identity?: ServiceIdentity;
  private lastError?: RegistrationError;
  private exportedPaths: string[] = [];

  constructor(
    connection: BusConnection,
    handlers: BusExposedHandlers,
    config: Partial<CoordinatorConfig> = {},
  ) {
    this.connection = connection;
    this.handlers = handlers;
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...config };
    this.log = createLogger("RegistrationCoordinator");
  }

  get state(): RegistrationState {
    return this._state;
  }

  isRegistered(): boolean {
    return this._state === "registered";
  }

  /**
   * The name this coordinator last tried to claim, or "".
   */
  serviceName(): string {
    return this.identity?.serviceName ?? "";
  }

  /**
   * Why the last claim did not succeed, or "" after a successful one.
   */
  errorMessage(): string {
    return this.lastError?.message ?? "";
  }

  error(): RegistrationError | undefined {
    return this.lastError;
  }

  /**
   * Attempts to claim `identity` on the bus.
   *
   * Bus errors are not thrown; they produce the "failed" state.
   */
  async register(
    identity: ServiceIdentity,
    options: StartupOptions,
  ): Promise<RegistrationState> {
    if (this._state === "registered") {
      this.log.warn("Already registered", {
        serviceName: this.serviceName(),
      });
      return this._state;
    }

    const name = identity.serviceName;
    this.identity = identity;
    this.lastError = undefined;
    this.log = createLogger("RegistrationCoordinator", name);

    // Objects go on the bus before the name, so a client that sees the
    // name can always reach them.
    this.exportHandlers(name);

    try {
      let reply = await this.claim(name);

      if (isContended(reply) && options.replace) {
        this.log.info("Name is owned, asking the owner to quit");
        if (await this.replaceOwner(name)) {
          reply = await this.claim(name);
        }
      }

      return this.settle(reply, identity, options);
    } catch (err) {
      this.unexportHandlers();
      const cause = toError(err);
      return this.fail(
        "failed",
        "BusUnavailable",
        `Could not register ${name} on the bus: ${cause.message}`,
        cause,
      );
    }
  }

  /**
   * Releases the name if it is held. Idempotent, never rejects; the
   * state changes before the first await.
   */
  async unregister(): Promise<void> {
    if (this._state !== "registered") {
      return;
    }

    const name = this.serviceName();
    this._state = "unregistered";
    this.unexportHandlers();
    this.log.info("Unregistering");

    try {
      await this.connection.releaseName(name);
    } catch (err) {
      this.log.warn("Could not release name", {
        reason: toError(err).message,
      });
    }
  }

  private async claim(name: string): Promise<RequestNameReply> {
    return this.connection.requestName(name, { doNotQueue: true });
  }

  private settle(
    reply: RequestNameReply,
    identity: ServiceIdentity,
    options: StartupOptions,
  ): RegistrationState {
    if (!isContended(reply)) {
      this._state = "registered";
      this.log.info("Registered on the bus", { options: options.toString() });
      return this._state;
    }

    this.unexportHandlers();
    const message = `Could not register name ${identity.serviceName}: another process owns it already`;

    if (identity.mode === "multiple") {
      return this.fail("failed", "NameTaken", message);
    }
    return this.fail("forwarding", "NameTaken", message);
  }

  /**
   * Asks the current owner to quit and waits until it has released the
   * name. An owner that is already gone when quit reaches it counts as
   * having left. Resolves false when it does not leave within
   * replaceTimeoutMs, or when the quit call fails outright.
   */
  private async replaceOwner(name: string): Promise<boolean> {
    let owner: string | null | undefined;
    let resolveVacated: (vacated: boolean) => void = () => {};
    const vacated = new Promise<boolean>((resolve) => {
      resolveVacated = resolve;
    });

    // Subscribed before the lookup, so a departure right after it is seen.
    const stopWatching = this.connection.watchNameOwner(name, (newOwner) => {
      if (owner !== undefined && newOwner !== owner) {
        resolveVacated(true);
      }
    });
    let timer: NodeJS.Timeout | undefined;

    try {
      owner = await this.connection.getNameOwner(name);
      if (owner === null) {
        return true;
      }
      const current = owner;

      timer = setTimeout(() => {
        this.log.warn("Owner did not quit in time", {
          owner: current,
          timeoutMs: this.config.replaceTimeoutMs,
        });
        resolveVacated(false);
      }, this.config.replaceTimeoutMs);

      const quit = this.connection
        .call(
          name,
          MAIN_APPLICATION_PATH,
          MAIN_APPLICATION_INTERFACE,
          "quit",
          "",
          [],
          this.config.replaceTimeoutMs,
        )
        .then(
          () => new Promise<boolean>(() => {}),
          (err: unknown) => {
            if (err instanceof BusError) {
              if (OWNER_GONE_ERRORS.has(err.errorName)) {
                return true;
              }
              // The owner may drop off the bus before replying to quit.
              if (err.errorName === BusErrorNames.NoReply) {
                return new Promise<boolean>(() => {});
              }
            }
            this.log.warn("Quit request failed", {
              owner: current,
              reason: toError(err).message,
            });
            return false;
          },
        );

      return await Promise.race([vacated, quit]);
    } finally {
      stopWatching();
      clearTimeout(timer);
    }
  }

  private fail(
    state: "forwarding" | "failed",
    kind: RegistrationErrorKind,
    message: string,
    cause?: Error,
  ): RegistrationState {
    this._state = state;
    this.lastError = new RegistrationError(
      kind,
      this.serviceName(),
      message,
      cause,
    );

    if (state === "forwarding") {
      this.log.info("Name is owned by another instance");
    } else {
      this.log.warn("Registration failed", { kind, reason: message });
    }
    return state;
  }

  private exportHandlers(name: string): void {
    const path = objectPathForService(name);
    this.connection.exportObject(path, createActivationInterfaces(this.handlers));
    this.connection.exportObject(
      MAIN_APPLICATION_PATH,
      createMainApplicationInterfaces(this.handlers),
    );
    this.exportedPaths = [path, MAIN_APPLICATION_PATH];
  }

  private unexportHandlers(): void {
    for (const path of this.exportedPaths) {
      this.connection.unexportObject(path);
    }
    this.exportedPaths = [];
  }
}

const OWNER_GONE_ERRORS: ReadonlySet<string> = new Set<string>([
  BusErrorNames.ServiceUnknown,
  BusErrorNames.NameHasNoOwner,
]);

function isContended(reply: RequestNameReply): boolean {
  return reply === "exists" || reply === "inQueue";
}
