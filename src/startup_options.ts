// src/startup_options.ts

import { ConfigurationError } from "./errors";

/**
 * Options controlling how a service registers on the bus.
 */
export enum StartupOption {
  /** Only one instance of the application may exist. */
  Unique = 1,
  /** Several instances may exist; the name carries the pid. The default. */
  Multiple = 2,
  /** Do not exit when registration or forwarding fails. */
  NoExitOnFailure = 4,
  /** Ask a running unique instance to quit, then take its name. */
  Replace = 8,
}

export type ServiceMode = "unique" | "multiple";

const KNOWN_BITS =
  StartupOption.Unique |
  StartupOption.Multiple |
  StartupOption.NoExitOnFailure |
  StartupOption.Replace;

/**
 * A validated set of startup options.
 *
 * Unique and Multiple are mutually exclusive; combining them throws a
 * ConfigurationError here, before anything touches the bus.
 *
 * @example
 * ```typescript
 * const options = new StartupOptions(StartupOption.Unique | StartupOption.Replace);
 * options.mode; // "unique"
 * ```
 */
export class StartupOptions {
  readonly flags: number;
  readonly mode: ServiceMode;

  constructor(flags: number = StartupOption.Multiple) {
    if (!Number.isInteger(flags) || flags < 0 || (flags & ~KNOWN_BITS) !== 0) {
      throw new ConfigurationError(`Unknown startup option bits: ${flags}`, {
        flags,
      });
    }

    if (
      (flags & StartupOption.Unique) !== 0 &&
      (flags & StartupOption.Multiple) !== 0
    ) {
      throw new ConfigurationError(
        "Unique and Multiple startup options are mutually exclusive",
        { flags },
      );
    }

    this.flags = flags;
    this.mode = (flags & StartupOption.Unique) !== 0 ? "unique" : "multiple";
    Object.freeze(this);
  }

  /**
   * Builds options from a list of flags.
   */
  static of(...options: StartupOption[]): StartupOptions {
    return new StartupOptions(options.reduce((acc, o) => acc | o, 0));
  }

  /**
   * Accepts either a raw bit set or an already validated value.
   */
  static from(value: number | StartupOptions | undefined): StartupOptions {
    if (value instanceof StartupOptions) {
      return value;
    }
    return new StartupOptions(value);
  }

  has(option: StartupOption): boolean {
    return (this.flags & option) !== 0;
  }

  get isUnique(): boolean {
    return this.mode === "unique";
  }

  get exitOnFailure(): boolean {
    return !this.has(StartupOption.NoExitOnFailure);
  }

  get replace(): boolean {
    return this.has(StartupOption.Replace);
  }

  toString(): string {
    const names = (
      ["Unique", "Multiple", "NoExitOnFailure", "Replace"] as const
    ).filter((name) => this.has(StartupOption[name]));
    return names.length > 0 ? names.join("|") : "Multiple";
  }
}
