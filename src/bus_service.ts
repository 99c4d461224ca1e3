// src/bus_service.ts

import { BusConnection, ConnectionFactory } from "./bus";
import {
  ActivationChannel,
  ActivationKind,
  ActivationListener,
  DeliveryMode,
} from "./activation_channel";
import { ActivationForwarder, ForwarderConfig } from "./activation_forwarder";
import { ActivationReceiver } from "./activation_receiver";
import { ActivationTokenStore, Environment } from "./activation_token";
import { DBusNextConnection } from "./dbus_next_connection";
import {
  BusServiceError,
  ForwardingError,
  RegistrationError,
  toError,
} from "./errors";
import { ExitCoordinator } from "./exit_coordinator";
import {
  objectPathForService,
  resolveServiceIdentity,
  ServiceIdentity,
} from "./identity";
import { createLogger, Logger } from "./logger";
import {
  CoordinatorConfig,
  RegistrationCoordinator,
  RegistrationState,
} from "./registration_coordinator";
import { StartupOptions } from "./startup_options";

/**
 * Configuration for a bus service.
 */
export interface BusServiceConfig {
  applicationName: string;
  /** Organization domain in its usual order, e.g. "kde.org" */
  organizationDomain?: string;
  /** Domain already reversed, e.g. "org.kde" */
  reversedDomain?: string;
  /** StartupOption bits, or a validated StartupOptions. Default: Multiple */
  options?: number | StartupOptions;
  /** A connection, or a function opening one. Default: the session bus */
  connection?: BusConnection | ConnectionFactory;
  /** How activation listeners are invoked. Default: "direct" */
  delivery?: DeliveryMode;
  /** Forwarded when another instance owns the name. Default: process.argv without the node binary */
  arguments?: string[];
  /** Default: process.cwd() */
  workingDirectory?: string;
  /** Environment holding the startup tokens. Default: process.env */
  env?: Environment;
  /** Ends the process. Default: process.exit */
  exit?: (code: number) => void;
  pid?: number | (() => number);
  coordinator?: Partial<CoordinatorConfig>;
  forwarder?: Partial<ForwarderConfig>;
}

/** Exit code used when registration or forwarding fails */
export const FAILURE_EXIT_CODE = 1;

const defaultConnectionFactory: ConnectionFactory = () =>
  DBusNextConnection.connect({ bus: "session" });

/**
 * Registers the current process on the bus and makes it the single live
 * instance of its application, or hands its command line over to the one
 * that already is.
 *
 * Once start() resolves without the process having exited, this instance
 * is either the owner of its service name, or registration failed and
 * NoExitOnFailure was set.
 *
 * @example
 * ```typescript
 * const service = await BusService.start({
 *   organizationDomain: "kde.org",
 *   applicationName: "kuiserver",
 *   options: StartupOption.Unique,
 * });
 * service.on("commandLine", ({ arguments: args }) => {
 *   if (args.includes("--bogus")) service.setExitValue(2);
 * });
 * ```
 */
export class BusService {
  readonly identity: ServiceIdentity;
  readonly options: StartupOptions;

  private readonly config: BusServiceConfig;
  private readonly channel: ActivationChannel;
  private readonly exitCoordinator = new ExitCoordinator();
  private readonly tokens: ActivationTokenStore;
  private readonly receiver: ActivationReceiver;
  private readonly exit: (code: number) => void;
  private readonly log: Logger;

  private connection?: BusConnection;
  private coordinator?: RegistrationCoordinator;
  private _state: RegistrationState = "unregistered";
  private lastError?: RegistrationError | ForwardingError;

  private constructor(
    config: BusServiceConfig,
    options: StartupOptions,
    identity: ServiceIdentity,
  ) {
    this.config = config;
    this.options = options;
    this.identity = identity;
    this.exit = config.exit ?? ((code) => process.exit(code));
    this.log = createLogger("BusService", identity.serviceName);

    this.channel = new ActivationChannel(
      config.delivery ?? "direct",
      identity.serviceName,
    );
    this.tokens = new ActivationTokenStore(config.env ?? process.env);
    this.receiver = new ActivationReceiver(
      this.channel,
      this.exitCoordinator,
      this.tokens,
      identity.serviceName,
      () => this.quitByDefault(),
    );
  }

  /**
   * Validates the configuration, then runs the registration sequence.
   *
   * @throws ConfigurationError for conflicting options or an invalid
   * identity, before any bus interaction.
   */
  static async start(config: BusServiceConfig): Promise<BusService> {
    const options = StartupOptions.from(config.options);
    const identity = resolveServiceIdentity({
      organizationDomain: config.organizationDomain,
      reversedDomain: config.reversedDomain,
      applicationName: config.applicationName,
      mode: options.mode,
      pid: config.pid,
    });

    const service = new BusService(config, options, identity);
    await service.run();
    return service;
  }

  get state(): RegistrationState {
    return this._state;
  }

  /**
   * The well-known name, e.g. "org.kde.kuiserver" or "org.kde.konqueror-1234".
   */
  get serviceName(): string {
    return this.identity.serviceName;
  }

  get objectPath(): string {
    return objectPathForService(this.identity.serviceName);
  }

  isRegistered(): boolean {
    return this._state === "registered";
  }

  /**
   * Why registration or forwarding failed, or "".
   */
  errorMessage(): string {
    return this.lastError?.message ?? "";
  }

  error(): BusServiceError | undefined {
    return this.lastError;
  }

  on<K extends ActivationKind>(
    kind: K,
    listener: ActivationListener<K>,
  ): () => void {
    return this.channel.on(kind, listener);
  }

  once<K extends ActivationKind>(
    kind: K,
    listener: ActivationListener<K>,
  ): () => void {
    return this.channel.once(kind, listener);
  }

  /**
   * Sets the exit value returned to a forwarding instance. Only takes
   * effect when called from a commandLine listener under direct delivery.
   */
  setExitValue(value: number): void {
    this.exitCoordinator.setExitValue(value);
  }

  /**
   * Returns the startup token of the activation being handled, and clears it.
   */
  takeActivationToken(): string | undefined {
    return this.tokens.take();
  }

  /**
   * Releases the service name. Idempotent.
   */
  async unregister(): Promise<void> {
    const coordinator = this.coordinator;
    if (!coordinator) {
      return;
    }
    await coordinator.unregister();
    this._state = coordinator.state;
  }

  /**
   * Unregisters, then closes the bus connection.
   */
  async shutdown(): Promise<void> {
    await this.unregister();
    await this.closeConnection();
  }

  private async run(): Promise<void> {
    // argv[0] is the node binary; the script is the program.
    const args = this.config.arguments ?? process.argv.slice(1);
    const workingDirectory = this.config.workingDirectory ?? process.cwd();

    // A second pass is made only when the owner vanished mid-forward.
    for (let attempt = 1; attempt <= 2; attempt++) {
      const bound = await this.ensureCoordinator();
      if (!bound) {
        this.handleFailure();
        return;
      }
      const { coordinator, connection } = bound;

      const state = await coordinator.register(this.identity, this.options);
      this._state = state;
      this.lastError = coordinator.error();

      if (state === "registered") {
        return;
      }
      if (state === "failed") {
        this.handleFailure();
        return;
      }

      const forwarder = new ActivationForwarder(
        connection,
        this.identity.serviceName,
        this.config.forwarder,
        this.config.env ?? process.env,
      );
      const result = await forwarder.forward(args, workingDirectory);

      if (result.ok) {
        this.log.info("Handled by the running instance", {
          exitCode: result.exitCode,
        });
        await this.closeConnection();
        this.exit(result.exitCode);
        return;
      }

      this.lastError = result.error;
      if (result.error.kind !== "OwnerUnreachable" || attempt === 2) {
        this.handleFailure();
        return;
      }
      this.log.info("Running instance went away, registering again");
    }
  }

  private async ensureCoordinator(): Promise<
    { coordinator: RegistrationCoordinator; connection: BusConnection } | undefined
  > {
    if (this.coordinator && this.connection) {
      return { coordinator: this.coordinator, connection: this.connection };
    }

    const source = this.config.connection ?? defaultConnectionFactory;
    let connection: BusConnection;
    try {
      connection = typeof source === "function" ? await source() : source;
    } catch (err) {
      const cause = toError(err);
      this._state = "failed";
      this.lastError = new RegistrationError(
        "BusUnavailable",
        this.identity.serviceName,
        `Could not connect to the bus: ${cause.message}`,
        cause,
      );
      return undefined;
    }

    const coordinator = new RegistrationCoordinator(
      connection,
      this.receiver,
      this.config.coordinator,
    );
    this.connection = connection;
    this.coordinator = coordinator;
    return { coordinator, connection };
  }

  private handleFailure(): void {
    if (!this.options.exitOnFailure) {
      this.log.warn("Continuing without registration", {
        reason: this.errorMessage(),
      });
      return;
    }
    this.log.error(this.errorMessage(), this.lastError);
    this.exit(FAILURE_EXIT_CODE);
  }

  private quitByDefault(): void {
    this.shutdown().then(
      () => this.exit(0),
      (err: unknown) => {
        this.log.error("Shutdown on quit failed", toError(err));
        this.exit(FAILURE_EXIT_CODE);
      },
    );
  }

  private async closeConnection(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    this.coordinator = undefined;
    if (connection) {
      await connection.disconnect();
    }
  }
}
