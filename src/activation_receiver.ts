// src/activation_receiver.ts

import { BusValue, PlatformData } from "./bus";
import { ActivationChannel, ActivationRequest } from "./activation_channel";
import { ActivationTokenStore } from "./activation_token";
import { ExitCoordinator } from "./exit_coordinator";
import { BusExposedHandlers } from "./service_adaptor";
import { createLogger, Logger } from "./logger";

/**
 * Reduces an ActivateAction parameter list to a single optional value.
 *
 * Zero elements means no parameter and one element is the parameter. A list
 * of two or more has no single-value reading and is also treated as no
 * parameter.
 */
export function collapseActionParameter(
  parameter: readonly BusValue[],
): BusValue | undefined {
  return parameter.length === 1 ? parameter[0] : undefined;
}

/**
 * Turns inbound bus calls into activation requests on the channel.
 * Active only on the instance that owns the service name.
 */
export class ActivationReceiver implements BusExposedHandlers {
  private readonly log: Logger;

  constructor(
    private readonly channel: ActivationChannel,
    private readonly exitCoordinator: ExitCoordinator,
    private readonly tokens: ActivationTokenStore,
    serviceName?: string,
    private readonly defaultQuit?: () => void,
  ) {
    this.log = createLogger("ActivationReceiver", serviceName);
  }

  activate(platformData: PlatformData): void {
    this.log.debug("Activate received");
    this.dispatch({ kind: "activate", platformData }, platformData);
  }

  open(uris: string[], platformData: PlatformData): void {
    this.log.debug("Open received", { count: uris.length });
    this.dispatch({ kind: "open", uris: [...uris], platformData }, platformData);
  }

  activateAction(
    actionName: string,
    parameter: BusValue[],
    platformData: PlatformData,
  ): void {
    if (parameter.length > 1) {
      this.log.debug("Dropping multi-value action parameter", {
        actionName,
        count: parameter.length,
      });
    }

    const value = collapseActionParameter(parameter);
    this.dispatch(
      {
        kind: "activateAction",
        actionName,
        ...(value !== undefined ? { parameter: value } : {}),
        platformData,
      },
      platformData,
    );
  }

  /**
   * Resets the exit value, delivers the command line, then replies with the
   * exit value as it stands when this returns. With queued delivery the
   * listeners have not run yet, so a value they set is not part of this
   * reply.
   */
  commandLine(
    args: string[],
    workingDirectory: string,
    platformData: PlatformData,
  ): number {
    this.exitCoordinator.reset();
    this.log.debug("CommandLine received", {
      argc: args.length,
      workingDirectory,
    });
    this.dispatch(
      {
        kind: "commandLine",
        arguments: [...args],
        workingDirectory,
        platformData,
      },
      platformData,
    );
    return this.exitCoordinator.currentExitValue();
  }

  /**
   * Delivers quit to the application, or runs the default quit action when
   * nothing listens for it.
   */
  quit(): void {
    this.log.info("Quit requested over the bus");
    if (this.defaultQuit && this.channel.listenerCount("quit") === 0) {
      this.defaultQuit();
      return;
    }
    this.channel.deliver({ kind: "quit" });
  }

  private dispatch(
    request: ActivationRequest,
    platformData: PlatformData,
  ): void {
    // A token left over from an earlier launch never reaches these listeners.
    if (!this.tokens.setFromPlatformData(platformData)) {
      this.tokens.clear();
    }
    this.channel.deliver(request, () => this.tokens.clear());
  }
}
