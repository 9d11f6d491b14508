import { describe, it, expect, beforeEach } from "vitest";
import { ChannelRegistry } from "../registry.js";
import { createFakeChannel } from "./fake-channel.js";

describe("ChannelRegistry", () => {
  let registry: ChannelRegistry;

  beforeEach(() => {
    registry = new ChannelRegistry();
  });

  it("registers and looks up plugins by id", () => {
    const { plugin } = createFakeChannel();
    registry.register(plugin);

    expect(registry.get("telegram")).toBe(plugin);
    expect(registry.get("sms")).toBeUndefined();
    expect(registry.getAll()).toEqual([plugin]);
  });

  it("replaces a plugin registered under the same id", () => {
    const first = createFakeChannel().plugin;
    const second = createFakeChannel().plugin;
    registry.register(first);
    registry.register(second);

    expect(registry.get("telegram")).toBe(second);
    expect(registry.getAll()).toHaveLength(1);
  });

  it("starts and stops every plugin", async () => {
    const { plugin } = createFakeChannel();
    registry.register(plugin);

    await registry.startAll();
    await registry.stopAll();

    expect(plugin.start).toHaveBeenCalledTimes(1);
    expect(plugin.stop).toHaveBeenCalledTimes(1);
  });

  it("handles an empty registry", async () => {
    await expect(registry.startAll()).resolves.toBeUndefined();
    await expect(registry.stopAll()).resolves.toBeUndefined();
  });
});
