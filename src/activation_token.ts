// src/activation_token.ts

import { PlatformData } from "./bus";

/** Environment variable carrying the XDG activation token */
export const ACTIVATION_TOKEN_ENV = "XDG_ACTIVATION_TOKEN";

/** Environment variable carrying the X11 startup notification id */
export const STARTUP_ID_ENV = "DESKTOP_STARTUP_ID";

/** Platform data keys of the two tokens */
export const PlatformDataKeys = {
  ActivationToken: "activation-token",
  DesktopStartupId: "desktop-startup-id",
} as const;

export type Environment = Record<string, string | undefined>;

/**
 * The startup token that may accompany an activation.
 *
 * The receiver puts the token from the caller's platform data into the
 * environment before delivering the activation, and clears it once the
 * listeners have run, whether or not the activation carried one. A listener that needs it calls take().
 * The contents are never interpreted.
 */
export class ActivationTokenStore {
  constructor(private readonly env: Environment = process.env) {}

  set(token: string): void {
    this.env[ACTIVATION_TOKEN_ENV] = token;
  }

  peek(): string | undefined {
    const token = this.env[ACTIVATION_TOKEN_ENV];
    return token ? token : undefined;
  }

  /**
   * Returns the token, if any, and clears it.
   */
  take(): string | undefined {
    const token = this.peek();
    this.clear();
    return token;
  }

  clear(): void {
    delete this.env[ACTIVATION_TOKEN_ENV];
  }

  /**
   * Stores the token carried by platform data, preferring the activation
   * token over the X11 startup id. Returns whether one was found.
   */
  setFromPlatformData(platformData: PlatformData): boolean {
    const token =
      platformData[PlatformDataKeys.ActivationToken] ??
      platformData[PlatformDataKeys.DesktopStartupId];
    if (typeof token !== "string" || token.length === 0) {
      return false;
    }
    this.set(token);
    return true;
  }
}

/**
 * Collects the platform data a forwarding instance sends along: the
 * startup tokens it was launched with, when set.
 */
export function platformDataFromEnvironment(
  env: Environment = process.env,
): PlatformData {
  const platformData: PlatformData = {};
  const startupId = env[STARTUP_ID_ENV];
  if (startupId) {
    platformData[PlatformDataKeys.DesktopStartupId] = startupId;
  }
  const token = env[ACTIVATION_TOKEN_ENV];
  if (token) {
    platformData[PlatformDataKeys.ActivationToken] = token;
  }
  return platformData;
}
