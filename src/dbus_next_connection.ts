// src/dbus_next_connection.ts

import { EventEmitter } from "events";
import * as dbus from "dbus-next";
import {
  BusConnection,
  BusValue,
  ExportedInterface,
  NameOwnerListener,
  RequestNameFlags,
  RequestNameReply,
  Unsubscribe,
} from "./bus";
import { BusError, BusErrorNames, TimeoutError, toError } from "./errors";
import { createLogger, Logger } from "./logger";

const DBUS_SERVICE = "org.freedesktop.DBus";
const DBUS_PATH = "/org/freedesktop/DBus";

const NAME_FLAG_ALLOW_REPLACEMENT = 1;
const NAME_FLAG_REPLACE_EXISTING = 2;
const NAME_FLAG_DO_NOT_QUEUE = 4;

const REQUEST_NAME_REPLIES: Record<number, RequestNameReply> = {
  1: "primaryOwner",
  2: "inQueue",
  3: "exists",
  4: "alreadyOwner",
};

const RELEASE_NAME_RELEASED = 1;

export type BusKind = "session" | "system";

export interface DBusNextConnectionConfig {
  bus: BusKind;
  /** Overrides the address taken from the environment */
  busAddress?: string;
}

/**
 * Splits a signature into its complete types: "assa{sv}" becomes
 * ["as", "s", "a{sv}"].
 */
export function splitSignature(signature: string): string[] {
  const types: string[] = [];
  let index = 0;

  const readType = (): void => {
    const c = signature[index++];
    if (c === "a") {
      readType();
    } else if (c === "(" || c === "{") {
      const close = c === "(" ? ")" : "}";
      while (signature[index] !== close) {
        if (index >= signature.length) {
          throw new BusError(BusErrorNames.InvalidArgs, `Invalid signature: ${signature}`);
        }
        readType();
      }
      index++;
    } else if (c === undefined) {
      throw new BusError(BusErrorNames.InvalidArgs, `Invalid signature: ${signature}`);
    }
  };

  while (index < signature.length) {
    const start = index;
    readType();
    types.push(signature.slice(start, index));
  }
  return types;
}

/**
 * Wraps a value in a variant, inferring its signature.
 */
export function toVariant(value: BusValue): dbus.Variant {
  if (typeof value === "string") return new dbus.Variant("s", value);
  if (typeof value === "boolean") return new dbus.Variant("b", value);
  if (typeof value === "bigint") return new dbus.Variant("x", value);
  if (typeof value === "number") {
    const isInt32 = Number.isInteger(value) && value >= -(2 ** 31) && value < 2 ** 31;
    return new dbus.Variant(isInt32 ? "i" : "d", value);
  }
  if (Array.isArray(value)) {
    if (value.every((v) => typeof v === "string")) {
      return new dbus.Variant("as", value);
    }
    return new dbus.Variant("av", value.map(toVariant));
  }
  return new dbus.Variant("a{sv}", toVariantDict(value));
}

function toVariantDict(value: BusValue): Record<string, dbus.Variant> {
  const dict: Record<string, dbus.Variant> = {};
  if (typeof value === "object" && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      dict[key] = toVariant(entry);
    }
  }
  return dict;
}

/**
 * Converts a value into the representation dbus-next marshals for
 * `signature`: variants for "v", dictionaries of variants for "a{sv}".
 */
export function marshalValue(signature: string, value: BusValue): unknown {
  if (signature === "v") {
    return toVariant(value);
  }
  if (signature === "a{sv}") {
    return toVariantDict(value);
  }
  if (signature.startsWith("a") && !signature.startsWith("a{") && Array.isArray(value)) {
    const element = signature.slice(1);
    return value.map((v) => marshalValue(element, v));
  }
  return value;
}

/**
 * Converts what dbus-next delivered into a BusValue, unwrapping variants.
 * Values with no BusValue form become undefined.
 */
export function unmarshalValue(value: unknown): BusValue | undefined {
  if (value instanceof dbus.Variant) {
    return unmarshalValue(value.value);
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return [...value];
  }
  if (Array.isArray(value)) {
    const list: BusValue[] = [];
    for (const entry of value) {
      const converted = unmarshalValue(entry);
      if (converted !== undefined) list.push(converted);
    }
    return list;
  }
  if (typeof value === "object" && value !== null) {
    const dict: Record<string, BusValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = unmarshalValue(entry);
      if (converted !== undefined) dict[key] = converted;
    }
    return dict;
  }
  return undefined;
}

function toBusError(err: unknown): Error {
  if (err instanceof dbus.DBusError) {
    return new BusError(err.type, err.text);
  }
  return toError(err);
}

/**
 * Builds a dbus-next interface object whose methods call the exported
 * handlers.
 */
function buildInterface(descriptor: ExportedInterface): dbus.interface.Interface {
  class Exported extends dbus.interface.Interface {}

  const methods: Record<string, { inSignature: string; outSignature: string }> = {};
  for (const [member, method] of Object.entries(descriptor.methods)) {
    const invoke = async (...args: unknown[]): Promise<unknown> => {
      const converted = args.map((a) => unmarshalValue(a) ?? "");
      try {
        const reply = await method.handler(converted);
        if (reply === undefined || method.outSignature === "") {
          return undefined;
        }
        return marshalValue(method.outSignature, reply);
      } catch (err) {
        if (err instanceof BusError) {
          throw new dbus.DBusError(err.errorName, err.message);
        }
        throw new dbus.DBusError(BusErrorNames.Failed, toError(err).message);
      }
    };
    Object.defineProperty(Exported.prototype, member, { value: invoke });
    methods[member] = {
      inSignature: method.inSignature,
      outSignature: method.outSignature,
    };
  }
  Exported.configureMembers({ methods });

  return new Exported(descriptor.name);
}

/**
 * A connection to a real D-Bus session or system bus, through dbus-next.
 *
 * @example
 * ```typescript
 * const connection = await DBusNextConnection.connect({ bus: "session" });
 * await connection.requestName("org.example.app", { doNotQueue: true });
 * ```
 */
export class DBusNextConnection implements BusConnection {
  readonly uniqueName: string;
  private readonly bus: dbus.MessageBus;
  private readonly daemon: dbus.ClientInterface;
  private readonly ownerChanges = new EventEmitter();
  private readonly exported = new Map<string, dbus.interface.Interface[]>();
  private readonly log: Logger;

  private constructor(
    bus: dbus.MessageBus,
    daemon: dbus.ClientInterface,
    uniqueName: string,
  ) {
    this.bus = bus;
    this.daemon = daemon;
    this.uniqueName = uniqueName;
    this.ownerChanges.setMaxListeners(0);
    this.log = createLogger("DBusNextConnection").child({ uniqueName });

    this.bus.on("error", (err: unknown) => {
      this.log.warn("Bus connection error", { reason: toError(err).message });
    });
    this.daemon.on(
      "NameOwnerChanged",
      (name: string, oldOwner: string, newOwner: string) => {
        this.ownerChanges.emit(name, newOwner || null, oldOwner || null);
      },
    );
  }

  /**
   * Connects to the bus and subscribes to owner changes.
   */
  static async connect(
    config: Partial<DBusNextConnectionConfig> = {},
  ): Promise<DBusNextConnection> {
    const kind = config.bus ?? "session";
    const bus =
      kind === "system"
        ? dbus.systemBus()
        : dbus.sessionBus(config.busAddress ? { busAddress: config.busAddress } : undefined);

    const failed = new Promise<never>((_, reject) => {
      bus.once("error", (err: unknown) => reject(toBusError(err)));
    });

    try {
      const proxy = await Promise.race([
        bus.getProxyObject(DBUS_SERVICE, DBUS_PATH),
        failed,
      ]);
      const daemon = proxy.getInterface(DBUS_SERVICE);
      const name: unknown = Reflect.get(bus, "name");
      if (typeof name !== "string" || name.length === 0) {
        throw new BusError(BusErrorNames.Failed, "Bus did not assign a unique name");
      }
      return new DBusNextConnection(bus, daemon, name);
    } catch (err) {
      bus.disconnect();
      throw toBusError(err);
    }
  }

  async requestName(
    name: string,
    flags: RequestNameFlags = {},
  ): Promise<RequestNameReply> {
    let bits = 0;
    if (flags.allowReplacement) bits |= NAME_FLAG_ALLOW_REPLACEMENT;
    if (flags.replaceExisting) bits |= NAME_FLAG_REPLACE_EXISTING;
    if (flags.doNotQueue) bits |= NAME_FLAG_DO_NOT_QUEUE;

    try {
      const reply: number = await this.bus.requestName(name, bits);
      const mapped = REQUEST_NAME_REPLIES[reply];
      if (!mapped) {
        throw new BusError(BusErrorNames.Failed, `Unexpected RequestName reply ${reply}`);
      }
      return mapped;
    } catch (err) {
      throw toBusError(err);
    }
  }

  async releaseName(name: string): Promise<boolean> {
    try {
      const reply: number = await this.bus.releaseName(name);
      return reply === RELEASE_NAME_RELEASED;
    } catch (err) {
      throw toBusError(err);
    }
  }

  async getNameOwner(name: string): Promise<string | null> {
    const message = new dbus.Message({
      destination: DBUS_SERVICE,
      path: DBUS_PATH,
      interface: DBUS_SERVICE,
      member: "GetNameOwner",
      signature: "s",
      body: [name],
    });

    try {
      const reply = await this.bus.call(message);
      const owner: unknown = reply?.body[0];
      return typeof owner === "string" ? owner : null;
    } catch (err) {
      const error = toBusError(err);
      if (error instanceof BusError && error.errorName === BusErrorNames.NameHasNoOwner) {
        return null;
      }
      throw error;
    }
  }

  watchNameOwner(name: string, listener: NameOwnerListener): Unsubscribe {
    this.ownerChanges.on(name, listener);
    return () => {
      this.ownerChanges.off(name, listener);
    };
  }

  exportObject(path: string, interfaces: ExportedInterface[]): void {
    this.unexportObject(path);
    const built = interfaces.map(buildInterface);
    for (const iface of built) {
      this.bus.export(path, iface);
    }
    this.exported.set(path, built);
  }

  unexportObject(path: string): void {
    const built = this.exported.get(path);
    if (!built) {
      return;
    }
    for (const iface of built) {
      this.bus.unexport(path, iface);
    }
    this.exported.delete(path);
  }

  async call(
    destination: string,
    path: string,
    interfaceName: string,
    member: string,
    signature: string,
    args: BusValue[],
    timeoutMs: number,
  ): Promise<BusValue | undefined> {
    const types = splitSignature(signature);
    const body = args.map((arg, i) => marshalValue(types[i] ?? "v", arg));
    const message = new dbus.Message({
      destination,
      path,
      interface: interfaceName,
      member,
      signature,
      body,
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`${interfaceName}.${member} on ${destination}`, timeoutMs)),
        timeoutMs,
      );
    });

    try {
      const reply = await Promise.race([this.bus.call(message), timeout]);
      const first: unknown = reply?.body[0];
      return unmarshalValue(first);
    } catch (err) {
      throw err instanceof TimeoutError ? err : toBusError(err);
    } finally {
      clearTimeout(timer);
    }
  }

  async disconnect(): Promise<void> {
    for (const path of [...this.exported.keys()]) {
      this.unexportObject(path);
    }
    this.ownerChanges.removeAllListeners();
    this.log.debug("Disconnecting");
    this.bus.disconnect();
  }
}
