// src/activation_channel.ts

import { BusValue, PlatformData } from "./bus";
import { toError } from "./errors";
import { createLogger, Logger } from "./logger";

export interface ActivateRequest {
  kind: "activate";
  platformData: PlatformData;
}

export interface CommandLineRequest {
  kind: "commandLine";
  /** Full invocation, starting with the program name */
  arguments: string[];
  workingDirectory: string;
  platformData: PlatformData;
}

export interface OpenRequest {
  kind: "open";
  uris: string[];
  platformData: PlatformData;
}

export interface ActivateActionRequest {
  kind: "activateAction";
  actionName: string;
  /** Absent when the call carried zero or several parameters */
  parameter?: BusValue;
  platformData: PlatformData;
}

export interface QuitRequest {
  kind: "quit";
}

export type ActivationRequest =
  | ActivateRequest
  | CommandLineRequest
  | OpenRequest
  | ActivateActionRequest
  | QuitRequest;

export type ActivationKind = ActivationRequest["kind"];

export type ActivationOf<K extends ActivationKind> = Extract<
  ActivationRequest,
  { kind: K }
>;

export type ActivationListener<K extends ActivationKind> = (
  request: ActivationOf<K>,
) => void | Promise<void>;

/**
 * How listeners are invoked:
 * - "direct": synchronously, inside deliver()
 * - "queued": on a later turn of the event loop
 */
export type DeliveryMode = "direct" | "queued";

type ListenerMap = {
  [K in ActivationKind]: ActivationListener<K>[];
};

/**
 * Delivers activation requests to the hosting application.
 *
 * Listeners run in registration order. A listener that throws (or whose
 * promise rejects) is logged and does not prevent the others from running.
 */
export class ActivationChannel {
  readonly delivery: DeliveryMode;
  private readonly listeners: ListenerMap = {
    activate: [],
    commandLine: [],
    open: [],
    activateAction: [],
    quit: [],
  };
  private readonly log: Logger;

  constructor(delivery: DeliveryMode = "direct", serviceName?: string) {
    this.delivery = delivery;
    this.log = createLogger("ActivationChannel", serviceName);
  }

  on<K extends ActivationKind>(
    kind: K,
    listener: ActivationListener<K>,
  ): () => void {
    const list: ActivationListener<K>[] = this.listeners[kind];
    list.push(listener);

    return () => {
      const index = list.indexOf(listener);
      if (index >= 0) list.splice(index, 1);
    };
  }

  once<K extends ActivationKind>(
    kind: K,
    listener: ActivationListener<K>,
  ): () => void {
    const off = this.on(kind, (request) => {
      off();
      return listener(request);
    });
    return off;
  }

  listenerCount(kind: ActivationKind): number {
    return this.listeners[kind].length;
  }

  removeAllListeners(): void {
    for (const list of Object.values(this.listeners)) {
      list.length = 0;
    }
  }

  /**
   * Delivers a request to its listeners.
   *
   * @param onDelivered Called once every listener has been invoked
   * (immediately for direct delivery, later for queued delivery). Async
   * listeners are not awaited before it.
   */
  deliver(request: ActivationRequest, onDelivered?: () => void): void {
    if (this.delivery === "direct") {
      this.invokeListeners(request);
      onDelivered?.();
      return;
    }

    setImmediate(() => {
      this.invokeListeners(request);
      onDelivered?.();
    });
  }

  private invokeListeners(request: ActivationRequest): void {
    switch (request.kind) {
      case "activate":
        return this.invoke(this.listeners.activate, request);
      case "commandLine":
        return this.invoke(this.listeners.commandLine, request);
      case "open":
        return this.invoke(this.listeners.open, request);
      case "activateAction":
        return this.invoke(this.listeners.activateAction, request);
      case "quit":
        return this.invoke(this.listeners.quit, request);
    }
  }

  private invoke<T extends ActivationRequest>(
    listeners: Array<(request: T) => void | Promise<void>>,
    request: T,
  ): void {
    if (listeners.length === 0) {
      this.log.debug("No listener for activation", { kind: request.kind });
      return;
    }

    for (const listener of [...listeners]) {
      try {
        const result = listener(request);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportFailure(request, err));
        }
      } catch (err) {
        this.reportFailure(request, err);
      }
    }
  }

  private reportFailure(request: ActivationRequest, err: unknown): void {
    this.log.error("Activation listener failed", toError(err), {
      kind: request.kind,
    });
  }
}
