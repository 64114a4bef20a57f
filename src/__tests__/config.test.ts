import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { loadFileConfig, resolveConfig, saveConfig } from "../config.js";
import { UsageError } from "../errors.js";

const ENV = [
  "PANORAMA_HOSTNAME", "PANORAMA_API_KEY", "PANORAMA_TARGET", "PANORAMA_PORT", "PANORAMA_PROTOCOL",
  "PANORAMA_TIMEOUT", "PANORAMA_INSECURE", "PANORAMA_READ_ONLY", "PANORAMA_LOG_LEVEL",
  "PANORAMA_JOB_POLL_INTERVAL", "PANORAMA_JOB_TIMEOUT",
];

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "panorama-cli-"));
  path = join(dir, "nested", "config.json");
  vi.stubEnv("PANORAMA_CONFIG", path);
  for (const name of ENV) vi.stubEnv(name, "");
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(dir, { recursive: true, force: true });
});

describe("loadFileConfig", () => {
  test("a missing file is an empty config", () => {
    expect(loadFileConfig()).toEqual({});
  });

  test("rejects unreadable JSON", () => {
    saveConfig({});
    writeFileSync(path, "{ not json");
    expect(() => loadFileConfig()).toThrow(/^Cannot read config file/);
  });

  test("rejects unknown keys and bad values", () => {
    saveConfig({});
    writeFileSync(path, JSON.stringify({ hostname: "pano.test", colour: "blue" }));
    expect(() => loadFileConfig()).toThrow(UsageError);

    writeFileSync(path, JSON.stringify({ protocol: "ftp" }));
    expect(() => loadFileConfig()).toThrow(/^Invalid config file .*protocol/);
  });
});

describe("saveConfig", () => {
  test("creates the file and merges later saves", () => {
    expect(saveConfig({ hostname: "pano.test" })).toBe(path);
    saveConfig({ apiKey: "test-secret" });

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ hostname: "pano.test", apiKey: "test-secret" });
    expect(statSync(path).mode & 0o777).toBe(0o600);
  });
});

describe("resolveConfig", () => {
  test("fills defaults", () => {
    expect(resolveConfig({})).toEqual({
      hostname: undefined,
      apiKey: undefined,
      target: undefined,
      port: undefined,
      protocol: "https",
      timeout: 10,
      insecure: false,
      readOnly: false,
      logLevel: "info",
      jobPollInterval: 1,
      jobTimeout: 600,
    });
  });

  test("flags beat environment, which beats the file", () => {
    saveConfig({ hostname: "file.test", apiKey: "file-secret", target: "file-serial", timeout: 30 });
    vi.stubEnv("PANORAMA_API_KEY", "env-secret");
    vi.stubEnv("PANORAMA_TARGET", "env-serial");

    const config = resolveConfig({ target: "cli-serial" });

    expect(config.hostname).toBe("file.test");
    expect(config.apiKey).toBe("env-secret");
    expect(config.target).toBe("cli-serial");
    expect(config.timeout).toBe(30);
  });

  test("numeric settings from strings", () => {
    vi.stubEnv("PANORAMA_PORT", "8443");
    vi.stubEnv("PANORAMA_JOB_TIMEOUT", "90");
    const config = resolveConfig({ timeout: "2.5" });
    expect(config.port).toBe(8443);
    expect(config.jobTimeout).toBe(90);
    expect(config.timeout).toBe(2.5);
  });

  test("boolean switches", () => {
    vi.stubEnv("PANORAMA_READ_ONLY", "1");
    const config = resolveConfig({ insecure: true });
    expect(config.readOnly).toBe(true);
    expect(config.insecure).toBe(true);
  });

  test("--verbose selects the op log level", () => {
    vi.stubEnv("PANORAMA_LOG_LEVEL", "warn");
    expect(resolveConfig({}).logLevel).toBe("warn");
    expect(resolveConfig({ verbose: true }).logLevel).toBe("op");
  });

  test("rejects invalid settings", () => {
    expect(() => resolveConfig({ port: "abc" })).toThrow(/^Invalid settings: port/);
    expect(() => resolveConfig({ logLevel: "loud" })).toThrow(UsageError);
  });

  test("caps the job poll interval at an hour", () => {
    vi.stubEnv("PANORAMA_JOB_POLL_INTERVAL", "3600");
    expect(resolveConfig({}).jobPollInterval).toBe(3600);
    vi.stubEnv("PANORAMA_JOB_POLL_INTERVAL", "3000000");
    expect(() => resolveConfig({})).toThrow(/^Invalid settings: jobPollInterval/);
  });
});
