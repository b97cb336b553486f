import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DefaultsService, settingMatches } from "../src/services/defaultsService.js";
import { DockService, dockActionSatisfied, parseDockList } from "../src/services/dockService.js";
import { EditorService } from "../src/services/editorService.js";
import { GitService } from "../src/services/gitService.js";
import { MasService, parseMasList } from "../src/services/masService.js";
import { ProcessService } from "../src/services/processService.js";
import { ShellProfileService, exportLine } from "../src/services/shellProfileService.js";
import { SudoService } from "../src/services/sudoService.js";
import { SettingSpec } from "../src/types.js";
import { FakeRunner, fail, ok } from "./fakes.js";

const DOCK_LIST = [
  "Safari\tfile:///Applications/Safari.app/\tpersistentApps\t/Users/test/Library/Preferences/com.apple.dock.plist",
  "Visual Studio Code\tfile:///Applications/Visual%20Studio%20Code.app/\tpersistentApps\t/Users/test/Library/Preferences/com.apple.dock.plist",
  "Downloads\tfile:///Users/test/Downloads/\tpersistentOthers\t/Users/test/Library/Preferences/com.apple.dock.plist"
].join("\n");

describe("MasService", () => {
  it("parses ids out of mas list", () => {
    expect(parseMasList("497799835  Xcode  (15.0)\n  409183694  Keynote (13.1)\n")).toEqual([497799835, 409183694]);
  });

  it("checks installation against mas list", async () => {
    const runner = new FakeRunner(() => ok("497799835  Xcode  (15.0)"));
    const service = new MasService(runner);

    await expect(service.isInstalled(497799835)).resolves.toBe(true);
    await expect(service.isInstalled(409183694)).resolves.toBe(false);
  });

  it("treats a failing mas account as signed out", async () => {
    const runner = new FakeRunner(() => fail("Not signed in"));
    const service = new MasService(runner);

    await expect(service.isSignedIn()).resolves.toBe(false);
    expect(runner.calls[0]).toEqual({ cmd: "mas", args: ["account"] });
  });

  it("reports an unknown sign-in state when mas no longer supports account", async () => {
    const runner = new FakeRunner(() =>
      fail("Error: This command is not supported on this macOS version due to changes in macOS.")
    );

    await expect(new MasService(runner).isSignedIn()).resolves.toBeNull();
  });

  it("treats a listed account as signed in", async () => {
    const runner = new FakeRunner(() => ok("test@example.com\n"));

    await expect(new MasService(runner).isSignedIn()).resolves.toBe(true);
  });

  it("installs by id", async () => {
    const runner = new FakeRunner(() => ok());
    await new MasService(runner, "/opt/homebrew/bin/mas").install(497799835);

    expect(runner.calls[0]).toEqual({ cmd: "/opt/homebrew/bin/mas", args: ["install", "497799835"] });
  });
});

describe("EditorService", () => {
  it("matches extension ids case-insensitively", async () => {
    const runner = new FakeRunner(() => ok("esbenp.prettier-vscode\nms-python.python"));
    const service = new EditorService(runner);

    await expect(service.isInstalled("ms-python.Python")).resolves.toBe(true);
    await expect(service.isInstalled("golang.go")).resolves.toBe(false);
    expect(runner.calls[0]).toEqual({ cmd: "code", args: ["--list-extensions"] });
  });

  it("installs with --install-extension", async () => {
    const runner = new FakeRunner(() => ok());
    await new EditorService(runner).install("golang.go");

    expect(runner.calls[0]).toEqual({ cmd: "code", args: ["--install-extension", "golang.go"] });
  });
});

describe("DefaultsService", () => {
  const bool: SettingSpec = { domain: "com.apple.finder", key: "AppleShowAllFiles", value: true, type: "bool" };

  it("returns null when the key does not exist", async () => {
    const runner = new FakeRunner(() => fail("The domain/default pair of (com.apple.finder, AppleShowAllFiles) does not exist"));

    await expect(new DefaultsService(runner).currentValue(bool)).resolves.toBeNull();
  });

  it("writes typed values", async () => {
    const runner = new FakeRunner(() => ok());
    const service = new DefaultsService(runner);

    await service.apply(bool);
    await service.apply({ domain: "com.apple.dock", key: "tilesize", value: 36, type: "int" });

    expect(runner.calls).toEqual([
      { cmd: "defaults", args: ["write", "com.apple.finder", "AppleShowAllFiles", "-bool", "true"] },
      { cmd: "defaults", args: ["write", "com.apple.dock", "tilesize", "-int", "36"] }
    ]);
  });

  it("compares current values by type", () => {
    expect(settingMatches(bool, "1")).toBe(true);
    expect(settingMatches(bool, "0")).toBe(false);
    expect(settingMatches({ ...bool, value: false }, "0")).toBe(true);
    expect(settingMatches({ domain: "d", key: "k", value: 0.5, type: "float" }, "0.5")).toBe(true);
    expect(settingMatches({ domain: "d", key: "k", value: 36, type: "int" }, "36")).toBe(true);
    expect(settingMatches({ domain: "d", key: "k", value: 36, type: "int" }, "")).toBe(false);
    expect(settingMatches({ domain: "d", key: "k", value: "png", type: "string" }, "png")).toBe(true);
    expect(settingMatches({ domain: "d", key: "k", value: "png", type: "string" }, null)).toBe(false);
  });
});

describe("DockService", () => {
  it("parses dockutil --list output", () => {
    expect(parseDockList(DOCK_LIST)).toEqual([
      { label: "Safari", url: "file:///Applications/Safari.app/" },
      { label: "Visual Studio Code", url: "file:///Applications/Visual%20Studio%20Code.app/" },
      { label: "Downloads", url: "file:///Users/test/Downloads/" }
    ]);
  });

  it("judges dock actions against current entries", () => {
    const entries = parseDockList(DOCK_LIST);

    expect(dockActionSatisfied(entries, { type: "add", path: "/Applications/Safari.app" })).toBe(true);
    expect(dockActionSatisfied(entries, { type: "add", path: "/Applications/Visual Studio Code.app" })).toBe(true);
    expect(dockActionSatisfied(entries, { type: "add", path: "/Applications/iTerm.app" })).toBe(false);
    expect(dockActionSatisfied(entries, { type: "remove", name: "Mail" })).toBe(true);
    expect(dockActionSatisfied(entries, { type: "remove", name: "Safari" })).toBe(false);
    expect(dockActionSatisfied(entries, { type: "replace", add: "/Applications/Safari.app", replace: "Mail" })).toBe(true);
    expect(dockActionSatisfied(entries, { type: "replace", add: "/Applications/Arc.app", replace: "Safari" })).toBe(false);
  });

  it("passes --no-restart on every change", async () => {
    const runner = new FakeRunner(() => ok());
    const service = new DockService(runner);

    await service.apply({ type: "replace", add: "/Applications/Arc.app", replace: "Safari" });
    await service.apply({ type: "remove", name: "Mail" });

    expect(runner.calls).toEqual([
      { cmd: "dockutil", args: ["--add", "/Applications/Arc.app", "--replacing", "Safari", "--no-restart"] },
      { cmd: "dockutil", args: ["--remove", "Mail", "--no-restart"] }
    ]);
  });
});

describe("GitService", () => {
  it("reads unset keys as undefined", async () => {
    const runner = new FakeRunner((_cmd, args) => (args[3] === "user.name" ? ok("Test User") : fail("", 1)));

    await expect(new GitService(runner).current()).resolves.toEqual({ name: "Test User", email: undefined });
  });

  it("writes name, email and color.ui", async () => {
    const runner = new FakeRunner(() => ok());
    await new GitService(runner).set({ name: "Test User", email: "test@example.com" });

    expect(runner.calls.map((call) => call.args)).toEqual([
      ["config", "--global", "user.name", "Test User"],
      ["config", "--global", "user.email", "test@example.com"],
      ["config", "--global", "color.ui", "true"]
    ]);
  });
});

describe("ProcessService", () => {
  it("restarts with killall and reports failures", async () => {
    const runner = new FakeRunner(() => fail("No matching processes belonging to you were found"));

    await expect(new ProcessService(runner).restart("Finder")).rejects.toThrow("No matching processes");
    expect(runner.calls[0]).toEqual({ cmd: "killall", args: ["Finder"] });
  });
});

describe("SudoService", () => {
  it("verifies a credential over stdin", async () => {
    const runner = new FakeRunner(() => ok());
    await expect(new SudoService(runner).verify("test-secret")).resolves.toBe(true);

    expect(runner.calls[0]).toEqual({ cmd: "sudo", args: ["-S", "-v", "-p", ""], input: "test-secret\n" });
  });

  it("uses non-interactive sudo without a credential and for refresh", async () => {
    const runner = new FakeRunner(() => fail("sudo: a password is required"));
    const service = new SudoService(runner);

    await expect(service.verify(null)).resolves.toBe(false);
    await expect(service.refresh()).resolves.toBe(false);
    expect(runner.calls.map((call) => call.args)).toEqual([
      ["-n", "-v"],
      ["-n", "-v"]
    ]);
  });
});

describe("ShellProfileService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "macprovision-profile-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("treats a missing profile as empty and creates it on append", async () => {
    const service = new ShellProfileService(join(dir, ".zshrc"));
    const line = exportLine("JAVA_HOME", "/opt/homebrew/opt/openjdk");

    await expect(service.hasLine(line)).resolves.toBe(false);
    await service.appendLine(line);

    await expect(readFile(join(dir, ".zshrc"), "utf8")).resolves.toBe("export JAVA_HOME=\"/opt/homebrew/opt/openjdk\"\n");
    await expect(service.hasLine(line)).resolves.toBe(true);
  });

  it("starts a new line when the profile lacks a trailing newline", async () => {
    const path = join(dir, ".zshrc");
    await writeFile(path, "alias ll='ls -la'", "utf8");

    await new ShellProfileService(path).appendLine("export EDITOR=\"vim\"");

    await expect(readFile(path, "utf8")).resolves.toBe("alias ll='ls -la'\nexport EDITOR=\"vim\"\n");
  });
});
