// src/activation_forwarder.ts

import { BusConnection, BusValue, PlatformData } from "./bus";
import {
  Environment,
  platformDataFromEnvironment,
} from "./activation_token";
import {
  BusError,
  BusErrorNames,
  ForwardingError,
  ForwardingErrorKind,
  TimeoutError,
  toError,
} from "./errors";
import { objectPathForService } from "./identity";
import { createLogger, Logger } from "./logger";
import { COMMAND_LINE_SIGNATURE, SERVICE_INTERFACE } from "./service_adaptor";

/**
 * Configuration for forwarding an invocation to the owning instance.
 */
export interface ForwarderConfig {
  /** How long to wait for the owner's reply (ms). Default: 5 minutes */
  forwardTimeoutMs: number;
}

export const DEFAULT_FORWARDER_CONFIG: ForwarderConfig = {
  // The owner may take a long time to handle a command line.
  forwardTimeoutMs: 5 * 60 * 1000,
};

export type ForwardResult =
  | { ok: true; exitCode: number }
  | { ok: false; error: ForwardingError };

const UNREACHABLE_ERRORS: ReadonlySet<string> = new Set<string>([
  BusErrorNames.ServiceUnknown,
  BusErrorNames.NameHasNoOwner,
  BusErrorNames.Disconnected,
]);

/**
 * Classifies a failed call to the owner.
 */
export function classifyForwardingFailure(err: unknown): ForwardingErrorKind {
  if (err instanceof TimeoutError) {
    return "Timeout";
  }
  if (err instanceof BusError) {
    if (err.errorName === BusErrorNames.NoReply) {
      return "Timeout";
    }
    if (UNREACHABLE_ERRORS.has(err.errorName)) {
      return "OwnerUnreachable";
    }
  }
  return "RemoteError";
}

/**
 * Hands this process's command line to the instance that owns the service
 * name and returns the exit code it replies with.
 *
 * A failure is returned, not thrown. "OwnerUnreachable" means the owner
 * left between the contended claim and the call; callers are expected to
 * run the registration sequence again once.
 */
export class ActivationForwarder {
  private readonly connection: BusConnection;
  private readonly serviceName: string;
  private readonly config: ForwarderConfig;
  private readonly env: Environment;
  private readonly log: Logger;

  constructor(
    connection: BusConnection,
    serviceName: string,
    config: Partial<ForwarderConfig> = {},
    env: Environment = process.env,
  ) {
    this.connection = connection;
    this.serviceName = serviceName;
    this.config = { ...DEFAULT_FORWARDER_CONFIG, ...config };
    this.env = env;
    this.log = createLogger("ActivationForwarder", serviceName);
  }

  /**
   * @param args The full invocation, program name first
   * @param platformData Defaults to the startup tokens in the environment
   */
  async forward(
    args: readonly string[],
    workingDirectory: string,
    platformData: PlatformData = platformDataFromEnvironment(this.env),
  ): Promise<ForwardResult> {
    this.log.debug("Forwarding command line", {
      argc: args.length,
      workingDirectory,
    });

    let reply: BusValue | undefined;
    try {
      reply = await this.connection.call(
        this.serviceName,
        objectPathForService(this.serviceName),
        SERVICE_INTERFACE,
        "CommandLine",
        COMMAND_LINE_SIGNATURE,
        [[...args], workingDirectory, platformData],
        this.config.forwardTimeoutMs,
      );
    } catch (err) {
      const cause = toError(err);
      const kind = classifyForwardingFailure(err);
      this.log.warn("Forwarding failed", { kind, reason: cause.message });
      return {
        ok: false,
        error: new ForwardingError(
          kind,
          this.serviceName,
          `Could not forward to ${this.serviceName}: ${cause.message}`,
          cause,
        ),
      };
    }

    if (typeof reply !== "number" || !Number.isInteger(reply)) {
      return {
        ok: false,
        error: new ForwardingError(
          "RemoteError",
          this.serviceName,
          `Unexpected reply from ${this.serviceName}: expected an integer exit code`,
        ),
      };
    }

    this.log.debug("Owner replied", { exitCode: reply });
    return { ok: true, exitCode: reply };
  }
}
