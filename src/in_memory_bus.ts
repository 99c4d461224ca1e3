// src/in_memory_bus.ts

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  BusConnection,
  BusValue,
  ExportedInterface,
  ExportedMethod,
  NameOwnerListener,
  RequestNameFlags,
  RequestNameReply,
  Unsubscribe,
} from "./bus";
import { BusError, BusErrorNames, toError } from "./errors";
import { createLogger, Logger } from "./logger";

const NO_SERVER = "org.freedesktop.DBus.Error.NoServer";

interface NameOwnerEntry {
  uniqueName: string;
  allowReplacement: boolean;
  doNotQueue: boolean;
}

/**
 * An in-process bus daemon, useful for testing and for hosting several
 * services inside one process.
 *
 * It implements the parts of the D-Bus daemon that the service relies on:
 * unique connection names, atomic well-known name ownership with queueing
 * and replacement, NameOwnerChanged notification, release of every name on
 * disconnect, and method calls routed by name, object path, interface and
 * member with a reply timeout.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryBus();
 * const a = await bus.connect();
 * const b = await bus.connect();
 * await a.requestName("org.example.app", { doNotQueue: true }); // "primaryOwner"
 * await b.requestName("org.example.app", { doNotQueue: true }); // "exists"
 * ```
 */
export class InMemoryBus {
  /** Bus id, as returned by org.freedesktop.DBus.GetId */
  readonly id: string = uuidv4().replace(/-/g, "");

  private readonly connections = new Map<string, InMemoryBusConnection>();
  private readonly names = new Map<string, NameOwnerEntry[]>();
  private readonly ownerChanges = new EventEmitter();
  private readonly log: Logger;
  private nextSerial = 1;
  private available = true;

  constructor() {
    this.ownerChanges.setMaxListeners(0);
    this.log = createLogger("InMemoryBus");
  }

  /**
   * Opens a new connection and assigns it a unique name.
   */
  async connect(): Promise<InMemoryBusConnection> {
    if (!this.available) {
      throw new BusError(NO_SERVER, "Failed to connect to the bus");
    }

    const uniqueName = `:1.${this.nextSerial++}`;
    const connection = new InMemoryBusConnection(this, uniqueName);
    this.connections.set(uniqueName, connection);
    this.emitOwnerChanged(uniqueName, null, uniqueName);
    this.log.debug("Connection opened", { uniqueName });
    return connection;
  }

  /**
   * Makes the bus refuse new connections, or accept them again.
   * Existing connections are not affected.
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /**
   * Returns the unique name of the primary owner of `name`, or null.
   * Unique names own themselves while connected.
   */
  getNameOwner(name: string): string | null {
    if (name.startsWith(":")) {
      return this.connections.has(name) ? name : null;
    }
    return this.names.get(name)?.[0]?.uniqueName ?? null;
  }

  /**
   * Returns the unique names queued for `name`, primary owner first.
   */
  getNameQueue(name: string): string[] {
    return (this.names.get(name) ?? []).map((e) => e.uniqueName);
  }

  listNames(): string[] {
    return [...this.connections.keys(), ...this.names.keys()];
  }

  connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Disconnects every connection and refuses new ones.
   */
  async close(): Promise<void> {
    this.available = false;
    for (const connection of [...this.connections.values()]) {
      await connection.disconnect();
    }
  }

  /** @internal */
  requestName(
    uniqueName: string,
    name: string,
    flags: RequestNameFlags,
  ): RequestNameReply {
    this.assertConnected(uniqueName);

    const queue = this.names.get(name) ?? [];
    const entry: NameOwnerEntry = {
      uniqueName,
      allowReplacement: flags.allowReplacement ?? false,
      doNotQueue: flags.doNotQueue ?? false,
    };

    const primary = queue[0];
    if (!primary) {
      this.names.set(name, [entry]);
      this.emitOwnerChanged(name, null, uniqueName);
      return "primaryOwner";
    }

    if (primary.uniqueName === uniqueName) {
      queue[0] = entry;
      return "alreadyOwner";
    }

    const rest = queue.slice(1).filter((e) => e.uniqueName !== uniqueName);

    if (primary.allowReplacement && flags.replaceExisting) {
      const displaced = primary.doNotQueue ? [] : [primary];
      this.names.set(name, [entry, ...displaced, ...rest]);
      this.emitOwnerChanged(name, primary.uniqueName, uniqueName);
      return "primaryOwner";
    }

    if (entry.doNotQueue) {
      this.names.set(name, [primary, ...rest]);
      return "exists";
    }

    const existing = queue.findIndex((e) => e.uniqueName === uniqueName);
    if (existing > 0) {
      queue[existing] = entry;
    } else {
      queue.push(entry);
    }
    this.names.set(name, queue);
    return "inQueue";
  }

  /** @internal */
  releaseName(uniqueName: string, name: string): boolean {
    const queue = this.names.get(name);
    if (!queue) {
      return false;
    }

    const index = queue.findIndex((e) => e.uniqueName === uniqueName);
    if (index < 0) {
      return false;
    }

    queue.splice(index, 1);
    if (index > 0) {
      return true;
    }

    const next = queue[0];
    if (next) {
      this.emitOwnerChanged(name, uniqueName, next.uniqueName);
    } else {
      this.names.delete(name);
      this.emitOwnerChanged(name, uniqueName, null);
    }
    return true;
  }

  /** @internal */
  watchNameOwner(name: string, listener: NameOwnerListener): Unsubscribe {
    const handler = (changed: string, oldOwner: string | null, newOwner: string | null) => {
      if (changed === name) {
        listener(newOwner, oldOwner);
      }
    };
    this.ownerChanges.on("NameOwnerChanged", handler);
    return () => {
      this.ownerChanges.off("NameOwnerChanged", handler);
    };
  }

  /** @internal */
  async dispatch(
    sender: string,
    destination: string,
    path: string,
    interfaceName: string,
    member: string,
    args: BusValue[],
    timeoutMs?: number,
  ): Promise<BusValue | undefined> {
    this.assertConnected(sender);

    const owner = this.getNameOwner(destination);
    const target = owner ? this.connections.get(owner) : undefined;
    if (!target) {
      throw new BusError(
        BusErrorNames.ServiceUnknown,
        `The name ${destination} was not provided by any .service files`,
      );
    }

    const method = target.findMethod(path, interfaceName, member);
    const payload = structuredClone(args);

    const invocation = (async () => {
      // Delivered on a later tick, as a real daemon would.
      await Promise.resolve();
      try {
        const reply = await method.handler(payload);
        return reply === undefined ? undefined : structuredClone(reply);
      } catch (err) {
        if (err instanceof BusError) {
          throw err;
        }
        throw new BusError(BusErrorNames.Failed, toError(err).message);
      }
    })();

    let timer: NodeJS.Timeout | undefined;
    let stopWatching: Unsubscribe | undefined;
    const failures = new Promise<never>((_, reject) => {
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () =>
            reject(
              new BusError(
                BusErrorNames.NoReply,
                `Did not receive a reply from ${destination} within ${timeoutMs}ms`,
              ),
            ),
          timeoutMs,
        );
      }
      stopWatching = target.onClose(() =>
        reject(
          new BusError(
            BusErrorNames.NoReply,
            `Remote peer ${target.uniqueName} disconnected before replying`,
          ),
        ),
      );
    });

    try {
      return await Promise.race([invocation, failures]);
    } finally {
      clearTimeout(timer);
      stopWatching?.();
    }
  }

  /** @internal */
  detach(uniqueName: string): void {
    if (!this.connections.delete(uniqueName)) {
      return;
    }

    for (const name of [...this.names.keys()]) {
      this.releaseName(uniqueName, name);
    }
    this.emitOwnerChanged(uniqueName, uniqueName, null);
    this.log.debug("Connection closed", { uniqueName });
  }

  private assertConnected(uniqueName: string): void {
    if (!this.connections.has(uniqueName)) {
      throw new BusError(
        BusErrorNames.Disconnected,
        "Connection is closed",
      );
    }
  }

  private emitOwnerChanged(
    name: string,
    oldOwner: string | null,
    newOwner: string | null,
  ): void {
    this.ownerChanges.emit("NameOwnerChanged", name, oldOwner, newOwner);
  }
}

/**
 * A connection to an InMemoryBus.
 */
export class InMemoryBusConnection implements BusConnection {
  private readonly objects = new Map<string, Map<string, ExportedInterface>>();
  private readonly watches = new Set<Unsubscribe>();
  private readonly closeListeners = new Set<() => void>();
  private readonly log: Logger;
  private connected = true;

  constructor(
    private readonly bus: InMemoryBus,
    readonly uniqueName: string,
  ) {
    this.log = createLogger("InMemoryBusConnection").child({ uniqueName });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async requestName(
    name: string,
    flags: RequestNameFlags = {},
  ): Promise<RequestNameReply> {
    return this.bus.requestName(this.uniqueName, name, flags);
  }

  async releaseName(name: string): Promise<boolean> {
    this.assertConnected();
    return this.bus.releaseName(this.uniqueName, name);
  }

  async getNameOwner(name: string): Promise<string | null> {
    this.assertConnected();
    return this.bus.getNameOwner(name);
  }

  watchNameOwner(name: string, listener: NameOwnerListener): Unsubscribe {
    const stop = this.bus.watchNameOwner(name, listener);
    const unsubscribe = () => {
      stop();
      this.watches.delete(unsubscribe);
    };
    this.watches.add(unsubscribe);
    return unsubscribe;
  }

  exportObject(path: string, interfaces: ExportedInterface[]): void {
    this.objects.set(path, new Map(interfaces.map((i) => [i.name, i])));
  }

  unexportObject(path: string): void {
    this.objects.delete(path);
  }

  async call(
    destination: string,
    path: string,
    interfaceName: string,
    member: string,
    _signature: string,
    args: BusValue[],
    timeoutMs: number,
  ): Promise<BusValue | undefined> {
    return this.bus.dispatch(
      this.uniqueName,
      destination,
      path,
      interfaceName,
      member,
      args,
      timeoutMs,
    );
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;

    for (const unsubscribe of [...this.watches]) {
      unsubscribe();
    }
    this.objects.clear();
    this.bus.detach(this.uniqueName);

    for (const listener of this.closeListeners) {
      listener();
    }
    this.closeListeners.clear();
  }

  /** @internal */
  onClose(listener: () => void): Unsubscribe {
    if (!this.connected) {
      listener();
      return () => {};
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** @internal */
  findMethod(
    path: string,
    interfaceName: string,
    member: string,
  ): ExportedMethod {
    const object = this.objects.get(path);
    if (!object) {
      throw new BusError(
        BusErrorNames.UnknownObject,
        `No such object path '${path}'`,
      );
    }

    const iface = object.get(interfaceName);
    if (!iface) {
      throw new BusError(
        BusErrorNames.UnknownInterface,
        `No such interface '${interfaceName}' at object path '${path}'`,
      );
    }

    const method = iface.methods[member];
    if (!method) {
      throw new BusError(
        BusErrorNames.UnknownMethod,
        `No such method '${member}' in interface '${interfaceName}' at object path '${path}'`,
      );
    }
    return method;
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new BusError(BusErrorNames.Disconnected, "Connection is closed");
    }
  }
}
