// test/activation_token.test.ts

import { describe, it, expect } from "vitest";
import {
  ACTIVATION_TOKEN_ENV,
  ActivationTokenStore,
  Environment,
  platformDataFromEnvironment,
  STARTUP_ID_ENV,
} from "../src";

describe("ActivationTokenStore", () => {
  it("takes the token once", () => {
    const env: Environment = {};
    const tokens = new ActivationTokenStore(env);

    tokens.set("token-1");

    expect(env[ACTIVATION_TOKEN_ENV]).toBe("token-1");
    expect(tokens.take()).toBe("token-1");
    expect(tokens.take()).toBeUndefined();
    expect(ACTIVATION_TOKEN_ENV in env).toBe(false);
  });

  it("treats an empty value as no token", () => {
    const tokens = new ActivationTokenStore({ [ACTIVATION_TOKEN_ENV]: "" });

    expect(tokens.peek()).toBeUndefined();
  });

  it("prefers the activation token in platform data", () => {
    const env: Environment = {};
    const tokens = new ActivationTokenStore(env);

    const found = tokens.setFromPlatformData({
      "desktop-startup-id": "x11-id",
      "activation-token": "wayland-token",
    });

    expect(found).toBe(true);
    expect(tokens.peek()).toBe("wayland-token");
  });

  it("falls back to the startup id", () => {
    const tokens = new ActivationTokenStore({});

    tokens.setFromPlatformData({ "desktop-startup-id": "x11-id" });

    expect(tokens.peek()).toBe("x11-id");
  });

  it("ignores platform data without a string token", () => {
    const env: Environment = {};
    const tokens = new ActivationTokenStore(env);

    expect(tokens.setFromPlatformData({ "activation-token": 5 })).toBe(false);
    expect(tokens.setFromPlatformData({})).toBe(false);
    expect(env).toEqual({});
  });
});

describe("platformDataFromEnvironment", () => {
  it("collects both tokens when present", () => {
    expect(
      platformDataFromEnvironment({
        [STARTUP_ID_ENV]: "x11-id",
        [ACTIVATION_TOKEN_ENV]: "wayland-token",
        HOME: "/home/test",
      }),
    ).toEqual({
      "desktop-startup-id": "x11-id",
      "activation-token": "wayland-token",
    });
  });

  it("is empty without tokens", () => {
    expect(platformDataFromEnvironment({ [STARTUP_ID_ENV]: "" })).toEqual({});
  });
});
