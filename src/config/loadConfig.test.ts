import { mkdtempSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import { DEFAULT_CONFIG } from "./config";
import { configPath, loadConfig, parseConfig } from "./loadConfig";

function tempFile(name: string, content: string): string {
  const dir = mkdtempSync(path.join(tmpdir(), "healgate-"));
  const file = path.join(dir, name);
  writeFileSync(file, content, "utf-8");
  return file;
}

describe("parseConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(parseConfig("")).toEqual(DEFAULT_CONFIG);
  });

  it("merges sections field by field", () => {
    const config = parseConfig(`
mode: APPROVAL
pipeline:
  recallK: 3
classifier:
  thresholds:
    latency_p99: { warning: 100, critical: 200 }
gateway:
  blacklist: [payments-db]
  breaker:
    failureThreshold: 5
`);

    expect(config.mode).toBe("APPROVAL");
    expect(config.pipeline).toEqual({ ...DEFAULT_CONFIG.pipeline, recallK: 3 });
    expect(config.classifier.thresholds.latency_p99).toEqual({ warning: 100, critical: 200 });
    expect(config.classifier.thresholds.error_rate).toEqual({ warning: 0.05, critical: 0.15 });
    expect(config.gateway.blacklist).toEqual(["payments-db"]);
    expect(config.gateway.maxBlastRadius).toBe(3);
    expect(config.gateway.breaker).toEqual({ failureThreshold: 5 });
  });

  it("replaces the policy list rather than merging it", () => {
    const config = parseConfig(`
policies:
  - name: page_on_errors
    priority: 1
    conditions: [{ metric: error_rate, operator: ">", threshold: 0.5 }]
    actions: [alert_team]
`);

    expect(config.policies).toEqual([
      {
        name: "page_on_errors",
        priority: 1,
        conditions: [{ metric: "error_rate", operator: ">", threshold: 0.5 }],
        actions: ["alert_team"],
      },
    ]);
  });

  it("names the offending field", () => {
    expect(() => parseConfig("mode: YOLO\n", "test.yaml")).toThrow(
      "[test.yaml] mode must be equal to one of the allowed values",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("executionPermitted: true\n")).toThrow(ConfigError);
  });

  it("rejects inverted z-score bands", () => {
    expect(() => parseConfig("classifier: { zWarning: 4, zCritical: 2 }\n")).toThrow(
      "classifier.zCritical must exceed zWarning",
    );
  });

  it("wraps YAML syntax errors", () => {
    expect(() => parseConfig("mode: [unclosed\n")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("reads the file named by HEALGATE_CONFIG", () => {
    const file = tempFile("healgate.yaml", "pipeline: { concurrency: 2 }\n");

    expect(loadConfig({ HEALGATE_CONFIG: file }).pipeline.concurrency).toBe(2);
  });

  it("fails when HEALGATE_CONFIG names a missing file", () => {
    expect(() => loadConfig({ HEALGATE_CONFIG: "/nonexistent/healgate.yaml" })).toThrow(
      "config file not found",
    );
  });

  it("accepts the sample configuration", () => {
    const sample = readFileSync(new URL("../../healgate.yaml", import.meta.url), "utf-8");
    const config = parseConfig(sample);

    expect(config.audit).toEqual({ exportPath: "audit.ndjson", intentsPath: "intents.ndjson" });
    expect(config.gateway.businessHours).toEqual({
      days: [1, 2, 3, 4, 5],
      startHour: 9,
      endHour: 17,
      utcOffsetMinutes: 0,
    });
  });

  it("resolves the path against the working directory", () => {
    expect(configPath({})).toBe(path.resolve(process.cwd(), "healgate.yaml"));
  });
});
