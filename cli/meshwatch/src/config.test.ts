import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, defaultConfig, loadConfig, parseConfig } from "./config.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "meshwatch-config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(value: unknown): string {
  const path = join(dir, "meshwatch.config.json");
  writeFileSync(path, JSON.stringify(value));
  return path;
}

describe("parseConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(parseConfig(undefined)).toEqual(defaultConfig());
    expect(parseConfig({})).toEqual(defaultConfig());
  });

  it("merges nested sections over the defaults", () => {
    const config = parseConfig({ mqtt: { topics: ["msh/US/#"] }, pipeline: { storeWorkers: 4 } });
    expect(config.mqtt.topics).toEqual(["msh/US/#"]);
    expect(config.mqtt.url).toBe("mqtt://localhost:1883");
    expect(config.pipeline.storeWorkers).toBe(4);
    expect(config.pipeline.decodeWorkers).toBe(2);
  });

  it("names the offending key", () => {
    expect(() => parseConfig({ pipeline: { decodeWorkers: 0 } })).toThrow(
      "config pipeline.decodeWorkers: must be an integer >= 1",
    );
    expect(() => parseConfig({ logLevel: "loud" })).toThrow(ConfigError);
    expect(() => parseConfig({ ignoreFromNodes: ["!0000002a"] })).toThrow("config ignoreFromNodes");
    expect(() => parseConfig({ mqtt: { reconnectMinMs: 5000, reconnectMaxMs: 1000 } })).toThrow(
      "config mqtt.reconnectMaxMs: must not be below mqtt.reconnectMinMs",
    );
  });
});

describe("loadConfig", () => {
  it("layers file, environment and flags", () => {
    const path = writeConfig({ mqtt: { url: "mqtt://file:1883" }, database: { path: "file.db" }, server: { port: 9300 } });
    const config = loadConfig(
      { configPath: path, port: "9400" },
      { MESHWATCH_MQTT_URL: "mqtt://env:1883", MESHWATCH_DB_PATH: "env.db", MESHWATCH_PORT: "9350" },
    );
    expect(config.mqtt.url).toBe("mqtt://env:1883");
    expect(config.database.path).toBe("env.db");
    expect(config.server.port).toBe(9400);
  });

  it("fails when a named config file is missing", () => {
    expect(() => loadConfig({ configPath: join(dir, "absent.json") }, {})).toThrow("file not found");
  });

  it("rejects malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ mqtt: ");
    expect(() => loadConfig({ configPath: path }, {})).toThrow("invalid JSON");
  });

  it("rejects an unknown log level from the environment", () => {
    const path = writeConfig({});
    expect(() => loadConfig({ configPath: path }, { MESHWATCH_LOG_LEVEL: "verbose" })).toThrow(
      "config MESHWATCH_LOG_LEVEL: unknown level",
    );
  });
});
