// src/identity.ts

import { ConfigurationError } from "./errors";
import { ServiceMode } from "./startup_options";

/**
 * Path of the object carrying the quit method used by the replace path.
 */
export const MAIN_APPLICATION_PATH = "/MainApplication";

const MAX_NAME_LENGTH = 255;
const NAME_ELEMENT = /^[A-Za-z_-][A-Za-z0-9_-]*$/;

/**
 * The canonical identity of a process on the bus. Frozen once resolved.
 */
export interface ServiceIdentity {
  readonly reversedDomain: string;
  readonly applicationName: string;
  readonly mode: ServiceMode;
  /** Present only in multiple mode */
  readonly pid?: number;
  /** The well-known bus name, e.g. "org.kde.kuiserver" or "org.kde.konqueror-1234" */
  readonly serviceName: string;
}

export interface IdentityInput {
  /** Organization domain in its usual order, e.g. "kde.org" */
  organizationDomain?: string;
  /** Domain already reversed, e.g. "org.kde". Takes precedence. */
  reversedDomain?: string;
  applicationName: string;
  mode: ServiceMode;
  pid?: number | (() => number);
}

/**
 * Reverses a dotted domain: "kde.org" becomes "org.kde".
 */
export function reverseDomain(domain: string): string {
  return domain
    .split(".")
    .filter((part) => part.length > 0)
    .reverse()
    .join(".");
}

/**
 * Checks a well-known bus name against the D-Bus naming rules.
 */
export function isValidServiceName(name: string): boolean {
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
    return false;
  }
  const elements = name.split(".");
  return elements.length >= 2 && elements.every((e) => NAME_ELEMENT.test(e));
}

/**
 * Derives the canonical service identity.
 *
 * The name is the reversed domain followed by the application name. In
 * multiple mode the pid is appended after a dash, so that two live
 * processes never share a name.
 *
 * @throws ConfigurationError for an empty domain or application name, or
 * a result that is not a valid bus name.
 */
export function resolveServiceIdentity(input: IdentityInput): ServiceIdentity {
  const reversedDomain =
    input.reversedDomain !== undefined
      ? input.reversedDomain.trim()
      : reverseDomain((input.organizationDomain ?? "").trim());
  const applicationName = input.applicationName.trim();

  if (reversedDomain.length === 0) {
    throw new ConfigurationError("Organization domain must not be empty");
  }
  if (applicationName.length === 0) {
    throw new ConfigurationError("Application name must not be empty");
  }

  let serviceName = `${reversedDomain}.${applicationName}`;
  let pid: number | undefined;

  if (input.mode === "multiple") {
    pid = typeof input.pid === "function" ? input.pid() : (input.pid ?? process.pid);
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new ConfigurationError(`Invalid process id: ${pid}`, { pid });
    }
    serviceName += `-${pid}`;
  }

  if (!isValidServiceName(serviceName)) {
    throw new ConfigurationError(`Invalid service name: ${serviceName}`, {
      serviceName,
    });
  }

  const identity: ServiceIdentity = {
    reversedDomain,
    applicationName,
    mode: input.mode,
    serviceName,
    ...(pid !== undefined ? { pid } : {}),
  };
  return Object.freeze(identity);
}

/**
 * Object path at which the activation interfaces of a service are exported:
 * "org.kde.konqueror" maps to "/org/kde/konqueror". Dashes are not allowed
 * in object paths and become underscores.
 */
export function objectPathForService(serviceName: string): string {
  return "/" + serviceName.replace(/\./g, "/").replace(/-/g, "_");
}
