import { describe, expect, test } from "@/test";
import config, {
  parseList,
  parsePositiveInt,
  parseVolumeStorage,
} from "./config";

describe("parsePositiveInt", () => {
  test("parses a positive integer", () => {
    expect(parsePositiveInt("250", 100)).toBe(250);
  });

  test("trims surrounding whitespace", () => {
    expect(parsePositiveInt(" 42 ", 100)).toBe(42);
  });

  test("falls back when unset", () => {
    expect(parsePositiveInt(undefined, 100)).toBe(100);
  });

  test("falls back on zero", () => {
    expect(parsePositiveInt("0", 100)).toBe(100);
  });

  test("falls back on values that are not integers", () => {
    expect(parsePositiveInt("1.5", 100)).toBe(100);
    expect(parsePositiveInt("-3", 100)).toBe(100);
    expect(parsePositiveInt("ten", 100)).toBe(100);
  });
});

describe("parseList", () => {
  test("splits on commas and drops empty entries", () => {
    expect(parseList("a, b,,c ", [])).toEqual(["a", "b", "c"]);
  });

  test("falls back when blank", () => {
    expect(parseList("  ", ["default"])).toEqual(["default"]);
    expect(parseList(undefined, ["default"])).toEqual(["default"]);
  });
});

describe("parseVolumeStorage", () => {
  test("returns null when unset", () => {
    expect(parseVolumeStorage(undefined)).toBeNull();
    expect(parseVolumeStorage("")).toBeNull();
  });

  test("parses a bare claim name", () => {
    expect(parseVolumeStorage("models")).toEqual({ claimName: "models" });
  });

  test("parses a claim with a sub-path", () => {
    expect(parseVolumeStorage("models/triton/repo")).toEqual({
      claimName: "models",
      subPath: "triton/repo",
    });
  });

  test("accepts the pvc scheme", () => {
    expect(parseVolumeStorage("pvc://models/triton/")).toEqual({
      claimName: "models",
      subPath: "triton",
    });
  });
});

describe("config", () => {
  test("reads the tracking server from the environment", () => {
    expect(config.mlflow.trackingUri).toBe("http://mlflow.test");
    expect(config.mlflow.publicUri).toBe("https://mlflow.example.com");
    expect(config.mlflow.token).toBe("test-secret");
  });

  test("hands deployed servers the token through a secret", () => {
    expect(config.mlflow.tokenSecret).toEqual({
      name: "in-job-deployment-auth-token",
      key: "token",
    });
  });

  test("leaves the model repository unset by default", () => {
    expect(config.modelRepository.mountPath).toBeUndefined();
    expect(config.modelRepository.storage).toBeNull();
  });
});
