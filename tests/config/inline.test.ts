import { parseArgs } from "node:util";
import { describe, expect, test } from "vitest";
import { CONFIG_FLAG_OPTIONS, extractOverrides, isEventSinkType, parseWholeNumber } from "../../src/config";

function parse(args: string[]) {
  return parseArgs({ args, options: CONFIG_FLAG_OPTIONS, allowPositionals: false }).values;
}

describe("extractOverrides", () => {
  test("no flags, no overrides", () => {
    expect(extractOverrides(parse([]))).toEqual({});
  });

  test("maps flags onto config sections", () => {
    const overrides = extractOverrides(
      parse([
        "-t",
        "test-token",
        "-e",
        "/opt/vault/bin/vault",
        "-p",
        "/srv/snaps",
        "-r",
        "14",
        "--prune",
        "--hostname",
        "node-b",
        "--vault-addr",
        "https://127.0.0.1:8200",
        "--timeout",
        "120",
        "--event-sink",
        "file",
        "--event-file",
        "/var/log/raftsnap.log",
      ]),
    );

    expect(overrides).toEqual({
      token: "test-token",
      vault: { executable: "/opt/vault/bin/vault", address: "https://127.0.0.1:8200" },
      backup: { path: "/srv/snaps", hostname: "node-b" },
      retention: { days: 14, prune: true },
      timeoutSeconds: 120,
      events: { sink: "file", filePath: "/var/log/raftsnap.log" },
    });
  });

  test("--no-prune turns pruning off", () => {
    expect(extractOverrides(parse(["--no-prune"]))).toEqual({ retention: { prune: false } });
  });

  test("--prune with --no-prune is rejected", () => {
    expect(() => extractOverrides(parse(["--prune", "--no-prune"]))).toThrow(
      "--prune and --no-prune cannot be used together",
    );
  });

  test("rejects an unknown event sink", () => {
    expect(() => extractOverrides(parse(["--event-sink", "eventvwr"]))).toThrow(
      "--event-sink must be one of: windows, syslog, file, none",
    );
  });

  test("rejects a negative retention", () => {
    expect(() => extractOverrides(parse(["--retention-days=-1"]))).toThrow(
      '--retention-days must be a whole number from 0 to 36500 (got "-1")',
    );
  });

  test("rejects a retention window past the upper bound", () => {
    expect(() => extractOverrides(parse(["-r", "1000000000"]))).toThrow(
      '--retention-days must be a whole number from 0 to 36500 (got "1000000000")',
    );
    expect(extractOverrides(parse(["-r", "36500"]))).toEqual({ retention: { days: 36500 } });
  });

  test("rejects a timeout setTimeout cannot hold", () => {
    expect(() => extractOverrides(parse(["--timeout", "2147484"]))).toThrow(
      '--timeout must be a whole number from 0 to 2147483 (got "2147484")',
    );
  });
});

describe("parseWholeNumber", () => {
  test("accepts zero and positive integers", () => {
    expect(parseWholeNumber("0", "timeout", 60)).toBe(0);
    expect(parseWholeNumber(" 30 ", "timeout", 60)).toBe(30);
    expect(parseWholeNumber("60", "timeout", 60)).toBe(60);
  });

  test("rejects fractions and words", () => {
    expect(() => parseWholeNumber("1.5", "timeout", 60)).toThrow(
      '--timeout must be a whole number from 0 to 60 (got "1.5")',
    );
    expect(() => parseWholeNumber("week", "retention-days", 60)).toThrow(/retention-days/);
    expect(() => parseWholeNumber("61", "timeout", 60)).toThrow(/from 0 to 60/);
  });
});

describe("isEventSinkType", () => {
  test("recognizes sink names", () => {
    expect(isEventSinkType("syslog")).toBe(true);
    expect(isEventSinkType("journald")).toBe(false);
    expect(isEventSinkType(undefined)).toBe(false);
  });
});
