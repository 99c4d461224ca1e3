// src/bus.ts

/**
 * A value that can cross the bus. Dictionaries map to `a{sv}`, arrays to
 * `av` (or `as` when every element is a string).
 */
export type BusValue =
  | string
  | number
  | boolean
  | bigint
  | BusValue[]
  | BusDict;

export interface BusDict {
  [key: string]: BusValue;
}

/**
 * Opaque key-value side channel accompanying activation calls.
 */
export type PlatformData = Record<string, BusValue>;

/**
 * Flags for a name claim, mirroring DBUS_NAME_FLAG_*.
 */
export interface RequestNameFlags {
  allowReplacement?: boolean;
  replaceExisting?: boolean;
  doNotQueue?: boolean;
}

/**
 * Reply to a name claim, mirroring DBUS_REQUEST_NAME_REPLY_*.
 */
export type RequestNameReply =
  | "primaryOwner"
  | "inQueue"
  | "exists"
  | "alreadyOwner";

/**
 * Handler for an exported method. Receives the call's arguments already
 * unwrapped from their variants and returns undefined for methods without
 * a reply.
 */
export type MethodHandler = (
  args: BusValue[],
) => BusValue | undefined | Promise<BusValue | undefined>;

export interface ExportedMethod {
  /** D-Bus signature of the arguments, e.g. "asa{sv}" */
  inSignature: string;
  /** D-Bus signature of the reply, "" for none */
  outSignature: string;
  handler: MethodHandler;
}

export interface ExportedInterface {
  name: string;
  methods: Record<string, ExportedMethod>;
}

/**
 * Listener for owner changes of a single name. `newOwner` is null once
 * the name has no owner.
 */
export type NameOwnerListener = (
  newOwner: string | null,
  oldOwner: string | null,
) => void;

export type Unsubscribe = () => void;

/**
 * A connection to a message bus.
 *
 * This is the only surface the service core uses. Implementations raise
 * BusError (with a D-Bus error name) for remote and protocol failures.
 */
export interface BusConnection {
  /**
   * The unique name the bus assigned to this connection, e.g. ":1.42".
   */
  readonly uniqueName: string;

  /**
   * Attempts to claim a well-known name.
   */
  requestName(name: string, flags?: RequestNameFlags): Promise<RequestNameReply>;

  /**
   * Releases a well-known name held or queued for by this connection.
   * Resolves false when the connection did not hold it.
   */
  releaseName(name: string): Promise<boolean>;

  /**
   * Returns the unique name of the current owner, or null.
   */
  getNameOwner(name: string): Promise<string | null>;

  /**
   * Watches owner changes of a name. The listener is called on every
   * NameOwnerChanged for that name.
   */
  watchNameOwner(name: string, listener: NameOwnerListener): Unsubscribe;

  /**
   * Exports interfaces at an object path. Exporting again at the same path
   * replaces the previous interfaces.
   */
  exportObject(path: string, interfaces: ExportedInterface[]): void;

  unexportObject(path: string): void;

  /**
   * Calls a method on a remote object and waits for the reply.
   * @param signature D-Bus signature of `args`
   * @returns The first reply value, or undefined for methods without one.
   */
  call(
    destination: string,
    path: string,
    interfaceName: string,
    member: string,
    signature: string,
    args: BusValue[],
    timeoutMs: number,
  ): Promise<BusValue | undefined>;

  /**
   * Closes the connection. The bus releases every name it held.
   */
  disconnect(): Promise<void>;
}

/**
 * Opens a connection. Used by the service so that connection failures are
 * reported as registration failures rather than thrown.
 */
export type ConnectionFactory = () => Promise<BusConnection>;

export function isBusDict(value: BusValue | undefined): value is BusDict {
  return typeof value === "object" && !Array.isArray(value);
}

/**
 * Narrows an argument to a platform data dictionary, treating anything
 * else as empty.
 */
export function toPlatformData(value: BusValue | undefined): PlatformData {
  return isBusDict(value) ? { ...value } : {};
}

export function toStringList(value: BusValue | undefined): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((v): v is string => typeof v === "string");
}
