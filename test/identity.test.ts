// test/identity.test.ts

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  isValidServiceName,
  objectPathForService,
  resolveServiceIdentity,
  reverseDomain,
} from "../src";

describe("reverseDomain", () => {
  it("reverses dotted domains", () => {
    expect(reverseDomain("kde.org")).toBe("org.kde");
    expect(reverseDomain("apps.example.com")).toBe("com.example.apps");
  });

  it("drops empty segments", () => {
    expect(reverseDomain(".kde.org.")).toBe("org.kde");
  });
});

describe("isValidServiceName", () => {
  it("accepts well-formed names", () => {
    expect(isValidServiceName("org.kde.kuiserver")).toBe(true);
    expect(isValidServiceName("org.kde.konqueror-1234")).toBe(true);
    expect(isValidServiceName("example.app")).toBe(true);
  });

  it("rejects names with a single element", () => {
    expect(isValidServiceName("kuiserver")).toBe(false);
  });

  it("rejects elements starting with a digit", () => {
    expect(isValidServiceName("org.2kde.app")).toBe(false);
  });

  it("rejects empty elements and overlong names", () => {
    expect(isValidServiceName("org..app")).toBe(false);
    expect(isValidServiceName("")).toBe(false);
    expect(isValidServiceName("org." + "a".repeat(252))).toBe(false);
  });
});

describe("resolveServiceIdentity", () => {
  it("builds a unique name from the organization domain", () => {
    const identity = resolveServiceIdentity({
      organizationDomain: "kde.org",
      applicationName: "kuiserver",
      mode: "unique",
    });

    expect(identity.serviceName).toBe("org.kde.kuiserver");
    expect(identity.reversedDomain).toBe("org.kde");
    expect(identity.pid).toBeUndefined();
  });

  it("appends the pid in multiple mode", () => {
    const identity = resolveServiceIdentity({
      organizationDomain: "kde.org",
      applicationName: "konqueror",
      mode: "multiple",
      pid: 1234,
    });

    expect(identity.serviceName).toBe("org.kde.konqueror-1234");
    expect(identity.pid).toBe(1234);
  });

  it("reads the pid from a provider", () => {
    const identity = resolveServiceIdentity({
      reversedDomain: "org.example",
      applicationName: "app",
      mode: "multiple",
      pid: () => 77,
    });

    expect(identity.serviceName).toBe("org.example.app-77");
  });

  it("defaults to the current process id", () => {
    const identity = resolveServiceIdentity({
      reversedDomain: "org.example",
      applicationName: "app",
      mode: "multiple",
    });

    expect(identity.serviceName).toBe(`org.example.app-${process.pid}`);
  });

  it("prefers an already reversed domain", () => {
    const identity = resolveServiceIdentity({
      organizationDomain: "ignored.net",
      reversedDomain: "org.kde",
      applicationName: "kate",
      mode: "unique",
    });

    expect(identity.serviceName).toBe("org.kde.kate");
  });

  it("trims its inputs", () => {
    const identity = resolveServiceIdentity({
      organizationDomain: " kde.org ",
      applicationName: " kate ",
      mode: "unique",
    });

    expect(identity.serviceName).toBe("org.kde.kate");
  });

  it("is deterministic for the same inputs", () => {
    const input = {
      organizationDomain: "kde.org",
      applicationName: "kate",
      mode: "multiple" as const,
      pid: 5,
    };

    expect(resolveServiceIdentity(input)).toEqual(resolveServiceIdentity(input));
  });

  it("returns a frozen identity", () => {
    const identity = resolveServiceIdentity({
      organizationDomain: "kde.org",
      applicationName: "kate",
      mode: "unique",
    });

    expect(Object.isFrozen(identity)).toBe(true);
  });

  it("rejects an empty domain", () => {
    expect(() =>
      resolveServiceIdentity({
        organizationDomain: "",
        applicationName: "kate",
        mode: "unique",
      }),
    ).toThrow(ConfigurationError);
  });

  it("rejects an empty application name", () => {
    expect(() =>
      resolveServiceIdentity({
        organizationDomain: "kde.org",
        applicationName: "   ",
        mode: "unique",
      }),
    ).toThrow("Application name must not be empty");
  });

  it("rejects names the bus would refuse", () => {
    expect(() =>
      resolveServiceIdentity({
        organizationDomain: "kde.org",
        applicationName: "my app",
        mode: "unique",
      }),
    ).toThrow("Invalid service name: org.kde.my app");
  });

  it("rejects an invalid pid", () => {
    expect(() =>
      resolveServiceIdentity({
        organizationDomain: "kde.org",
        applicationName: "kate",
        mode: "multiple",
        pid: 0,
      }),
    ).toThrow(ConfigurationError);
  });
});

describe("objectPathForService", () => {
  it("maps dots to slashes", () => {
    expect(objectPathForService("org.kde.konqueror")).toBe("/org/kde/konqueror");
  });

  it("maps dashes to underscores", () => {
    expect(objectPathForService("org.kde.konqueror-1234")).toBe(
      "/org/kde/konqueror_1234",
    );
  });
});
