import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { getDefaultConfig, parseConfig, thresholdFor } from "../config";
import { ConfigError } from "../errors";

describe("parseConfig", () => {
  it("fills in defaults for an empty file", () => {
    const config = parseConfig(null);

    expect(config.database.path).toBe(resolve("./.rollcall.db"));
    expect(config.gallery).toEqual({ kind: "embedding", dimension: 128, histogramMetric: "chi-square" });
    expect(config.recognition).toEqual({
      maxFaces: 50,
      thresholds: { embedding: 0.6, histogram: 100 },
      concurrency: 4,
      timeoutMs: 30000,
    });
    expect(config.detector.backend).toBe("service");
    expect(config.logging.level).toBe("info");
  });

  it("expands home-relative database paths and keeps :memory:", () => {
    expect(parseConfig({ database: { path: "~/faces.db" } }).database.path).toBe(join(homedir(), "faces.db"));
    expect(parseConfig({ database: { path: ":memory:" } }).database.path).toBe(":memory:");
  });

  it("lists every invalid field", () => {
    const parse = () => parseConfig({ recognition: { maxFaces: 0 }, gallery: { kind: "pixels" } });

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow(/gallery\.kind: .*; recognition\.maxFaces: /);
  });

  it("accepts the annotated template", () => {
    const config = parseConfig(parseYaml(getDefaultConfig()));

    expect(config.faceService.url).toBe("http://127.0.0.1:5001");
    expect(config.aws.rateLimit).toEqual({ minTime: 200, maxConcurrent: 5 });
  });
});

describe("thresholdFor", () => {
  it("picks the threshold for the gallery kind", () => {
    expect(thresholdFor(parseConfig({}))).toBe(0.6);
    expect(thresholdFor(parseConfig({ gallery: { kind: "histogram" }, recognition: { thresholds: { histogram: 80 } } }))).toBe(80);
  });
});
