import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { EventLogError } from "../../src/errors";
import {
  createEventSink,
  defaultSinkType,
  FileEventSink,
  NullEventSink,
  PreviewEventSink,
  SyslogEventSink,
  WindowsEventSink,
} from "../../src/events";
import { buildLoggerArgs, toFacility } from "../../src/events/sinks/syslog";
import {
  buildNewEventLogCommand,
  buildWriteEventLogCommand,
  quotePowerShell,
} from "../../src/events/sinks/windows";
import type { EventEntry } from "../../src/types";
import { createFakeRunner, createTempDir, removeTempDir } from "../support/fakes";

const infoEntry: EventEntry = { eventId: 1000, severity: "info", message: "Raft snapshot saved: C:\\b\\x.snap" };
const errorEntry: EventEntry = { eventId: 1100, severity: "error", message: "can't reach leader" };

describe("windows sink", () => {
  test("quotePowerShell doubles single quotes", () => {
    expect(quotePowerShell("can't")).toBe("'can''t'");
  });

  test("builds a Write-EventLog command", () => {
    expect(buildWriteEventLogCommand("Application", "VaultRaftBackup", errorEntry)).toBe(
      "Write-EventLog -LogName 'Application' -Source 'VaultRaftBackup' -EventId 1100 -EntryType Error -Message 'can''t reach leader'",
    );
  });

  test("info entries use the Information entry type", () => {
    expect(buildWriteEventLogCommand("Application", "S", infoEntry)).toContain("-EntryType Information");
  });

  test("writes through powershell.exe", async () => {
    const { runner, calls } = createFakeRunner();
    const sink = new WindowsEventSink("Application", "VaultRaftBackup", runner);

    await sink.write(infoEntry);

    expect(calls[0]?.file).toBe("powershell.exe");
    expect(calls[0]?.args.slice(0, 3)).toEqual(["-NoProfile", "-NonInteractive", "-Command"]);
    expect(calls[0]?.args[3]).toBe(buildWriteEventLogCommand("Application", "VaultRaftBackup", infoEntry));
  });

  test("register runs New-EventLog", async () => {
    const { runner, calls } = createFakeRunner();
    const sink = new WindowsEventSink("Application", "VaultRaftBackup", runner);

    await sink.register();

    expect(calls[0]?.args[3]).toBe(buildNewEventLogCommand("Application", "VaultRaftBackup"));
    expect(calls[0]?.args[3]).toBe("New-EventLog -LogName 'Application' -Source 'VaultRaftBackup'");
  });

  test("a failed write raises EventLogError with stderr", async () => {
    const { runner } = createFakeRunner({
      "-NoProfile": { exitCode: 1, stderr: "The source name VaultRaftBackup does not exist" },
    });
    const sink = new WindowsEventSink("Application", "VaultRaftBackup", runner);

    await expect(sink.write(infoEntry)).rejects.toThrow(
      new EventLogError("The source name VaultRaftBackup does not exist"),
    );
  });
});

describe("syslog sink", () => {
  test("maps log names to facilities", () => {
    expect(toFacility("Application")).toBe("user");
    expect(toFacility("LOCAL3")).toBe("local3");
    expect(toFacility("daemon")).toBe("daemon");
  });

  test("builds logger arguments with priority and id", () => {
    expect(buildLoggerArgs("local0", "VaultRaftBackup", errorEntry)).toEqual([
      "-t",
      "VaultRaftBackup",
      "-p",
      "local0.err",
      "--",
      "[1100] can't reach leader",
    ]);
  });

  test("writes through the logger command", async () => {
    const { runner, calls } = createFakeRunner();
    const sink = new SyslogEventSink("Application", "VaultRaftBackup", runner);

    await sink.write(infoEntry);

    expect(calls[0]?.file).toBe("logger");
    expect(calls[0]?.args[3]).toBe("user.info");
  });

  test("register spawns nothing", async () => {
    const { runner, calls } = createFakeRunner();
    await new SyslogEventSink("Application", "S", runner).register();
    expect(calls).toHaveLength(0);
  });
});

describe("file sink", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir("events");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  test("refuses to write before registration", async () => {
    const sink = new FileEventSink(path.join(tempDir, "events.log"), "Application", "VaultRaftBackup");

    await expect(sink.write(infoEntry)).rejects.toBeInstanceOf(EventLogError);
  });

  test("register creates the log and writes append JSON lines", async () => {
    const logPath = path.join(tempDir, "logs", "events.log");
    const sink = new FileEventSink(logPath, "Application", "VaultRaftBackup");

    await sink.register();
    await sink.write(infoEntry);
    await sink.write(errorEntry);

    const lines = (await readFile(logPath, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    const first: unknown = JSON.parse(lines[0] ?? "");
    expect(first).toMatchObject({
      logName: "Application",
      source: "VaultRaftBackup",
      eventId: 1000,
      severity: "info",
      message: infoEntry.message,
    });
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ eventId: 1100, severity: "error" });
  });

  test("register keeps existing entries", async () => {
    const logPath = path.join(tempDir, "events.log");
    await writeFile(logPath, "existing\n");

    await new FileEventSink(logPath, "Application", "S").register();

    expect(await readFile(logPath, "utf8")).toBe("existing\n");
  });
});

describe("sink factory", () => {
  test("default sink depends on the platform", () => {
    expect(defaultSinkType("win32")).toBe("windows");
    expect(defaultSinkType("linux")).toBe("syslog");
  });

  test("creates each sink type", () => {
    const base = { logName: "Application", source: "S" };
    expect(createEventSink({ ...base, sink: "windows" })).toBeInstanceOf(WindowsEventSink);
    expect(createEventSink({ ...base, sink: "syslog" })).toBeInstanceOf(SyslogEventSink);
    expect(createEventSink({ ...base, sink: "file", filePath: "/tmp/e.log" })).toBeInstanceOf(FileEventSink);
    expect(createEventSink({ ...base, sink: "none" })).toBeInstanceOf(NullEventSink);
  });

  test("file sink without a path is a config error", () => {
    expect(() => createEventSink({ logName: "A", source: "S", sink: "file" })).toThrow(
      "events.filePath is required when events.sink is 'file'",
    );
  });
});

describe("preview sink", () => {
  test("describes writes without touching the inner sink", async () => {
    const { runner, calls } = createFakeRunner();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const sink = new PreviewEventSink(new SyslogEventSink("user", "S", runner));

    await sink.write(infoEntry);

    expect(calls).toHaveLength(0);
    expect(String(logSpy.mock.calls[0]?.[0])).toContain("What if: write info event 1000 to syslog log");
    logSpy.mockRestore();
  });
});
