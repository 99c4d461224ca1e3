// test/startup_options.test.ts

import { describe, it, expect } from "vitest";
import { ConfigurationError, StartupOption, StartupOptions } from "../src";

describe("StartupOptions", () => {
  it("defaults to Multiple", () => {
    const options = new StartupOptions();

    expect(options.mode).toBe("multiple");
    expect(options.isUnique).toBe(false);
    expect(options.exitOnFailure).toBe(true);
    expect(options.replace).toBe(false);
  });

  it("treats an empty flag set as multiple mode", () => {
    const options = new StartupOptions(0);

    expect(options.mode).toBe("multiple");
    expect(options.toString()).toBe("Multiple");
  });

  it("reads Unique with modifiers", () => {
    const options = StartupOptions.of(
      StartupOption.Unique,
      StartupOption.Replace,
      StartupOption.NoExitOnFailure,
    );

    expect(options.mode).toBe("unique");
    expect(options.replace).toBe(true);
    expect(options.exitOnFailure).toBe(false);
    expect(options.toString()).toBe("Unique|NoExitOnFailure|Replace");
  });

  it("rejects Unique together with Multiple", () => {
    expect(
      () => new StartupOptions(StartupOption.Unique | StartupOption.Multiple),
    ).toThrow(ConfigurationError);
  });

  it("rejects unknown bits", () => {
    expect(() => new StartupOptions(16)).toThrow("Unknown startup option bits: 16");
    expect(() => new StartupOptions(-1)).toThrow(ConfigurationError);
  });

  it("passes validated options through from()", () => {
    const options = new StartupOptions(StartupOption.Unique);

    expect(StartupOptions.from(options)).toBe(options);
    expect(StartupOptions.from(undefined).mode).toBe("multiple");
    expect(StartupOptions.from(StartupOption.Unique).isUnique).toBe(true);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(new StartupOptions(StartupOption.Unique))).toBe(true);
  });
});
