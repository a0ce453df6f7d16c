import { describe, expect, test } from "vitest";
import { parseArgs } from "../../cli/args";

describe("parseArgs", () => {
  test("reads the cluster and optional overrides", () => {
    expect(parseArgs(["--cluster-id", "my-cluster", "--url=https://api.example.test", "--token", "test-secret"])._unsafeUnwrap()).toEqual({
      command: "status",
      clusterId: "my-cluster",
      url: "https://api.example.test",
      token: "test-secret",
    });
  });

  test("accepts the short cluster flag in both forms", () => {
    expect(parseArgs(["-C", "abc"])._unsafeUnwrap()).toEqual({ command: "status", clusterId: "abc", url: undefined, token: undefined });
    expect(parseArgs(["-C=abc"])._unsafeUnwrap()).toMatchObject({ clusterId: "abc" });
  });

  test("help and version take precedence", () => {
    expect(parseArgs(["--cluster-id", "x", "--help"])._unsafeUnwrap()).toEqual({ command: "help" });
    expect(parseArgs(["-v"])._unsafeUnwrap()).toEqual({ command: "version" });
  });

  test("requires the cluster flag", () => {
    expect(parseArgs([])._unsafeUnwrapErr().message).toBe("required flag --cluster-id not set");
    expect(parseArgs(["--url", "https://api.example.test"])._unsafeUnwrapErr().message).toBe(
      "required flag --cluster-id not set",
    );
  });

  test("rejects unknown arguments and missing values", () => {
    expect(parseArgs(["status"])._unsafeUnwrapErr().message).toBe("unknown argument: status");
    expect(parseArgs(["--cluster-id"])._unsafeUnwrapErr().message).toBe("flag --cluster-id needs a value");
    expect(parseArgs(["--token="])._unsafeUnwrapErr().message).toBe("flag --token needs a value");
  });

  test("does not treat inherited object keys as flags", () => {
    expect(parseArgs(["constructor"])._unsafeUnwrapErr().message).toBe("unknown argument: constructor");
  });
});
