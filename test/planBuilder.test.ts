import { describe, expect, it } from "vitest";
import { formatPlan } from "../src/core/format.js";
import { buildPlan, needsPrivilege } from "../src/core/planBuilder.js";
import { PackageSpec, Providers } from "../src/types.js";
import { FakeSystem, capabilities, desiredState, entryFor, formulae } from "./fakes.js";

const FIXED_NOW = () => new Date("2026-01-01T00:00:00.000Z");

describe("buildPlan", () => {
  it("emits pending actions in input order for a fresh machine", async () => {
    const system = new FakeSystem();

    const plan = await buildPlan(desiredState({ packages: formulae("git", "curl") }), capabilities(), system.providers(), {
      now: FIXED_NOW
    });

    expect(plan.createdAt).toBe("2026-01-01T00:00:00.000Z");
    expect(plan.actions.map((action) => [action.id, action.marker])).toEqual([
      ["formula:git", { state: "pending" }],
      ["formula:curl", { state: "pending" }]
    ]);
  });

  it("yields exactly one action per requested item", async () => {
    const system = new FakeSystem();
    system.packages.add("formula:git");
    const desired = desiredState({
      packages: [...formulae("git", "jq"), { kind: "cask", name: "iterm2" }, { kind: "app-store", name: "Xcode", appId: 497799835 }],
      settings: [{ domain: "com.apple.dock", key: "autohide", value: true, type: "bool" }],
      dock: [
        { type: "add", path: "/Applications/iTerm.app" },
        { type: "remove", name: "Mail" }
      ],
      identity: { name: "Test User", email: "test@example.com" },
      shell: { profile: "/tmp/.zshrc", exports: [{ key: "EDITOR", value: "vim" }] }
    });

    const plan = await buildPlan(desired, capabilities({ appStore: null }), system.providers());

    expect(plan.actions).toHaveLength(4 + 1 + 2 + 1 + 1);
  });

  it("orders kinds regardless of input order and keeps input order within a kind", async () => {
    const packages: PackageSpec[] = [
      { kind: "privileged-cask", name: "docker" },
      { kind: "cask", name: "iterm2" },
      { kind: "formula", name: "wget" },
      { kind: "editor-extension", name: "golang.go" },
      { kind: "cask", name: "arc" },
      { kind: "formula", name: "git" },
      { kind: "tap", name: "homebrew/cask-fonts" }
    ];
    const desired = desiredState({
      packages,
      dock: [{ type: "remove", name: "Mail" }],
      settings: [{ domain: "NSGlobalDomain", key: "KeyRepeat", value: 2, type: "int" }]
    });

    const plan = await buildPlan(desired, capabilities(), new FakeSystem().providers());

    expect(plan.actions.map((action) => action.id)).toEqual([
      "tap:homebrew/cask-fonts",
      "formula:wget",
      "formula:git",
      "cask:iterm2",
      "cask:arc",
      "privileged-cask:docker",
      "editor-extension:golang.go",
      "setting:NSGlobalDomain:KeyRepeat",
      "dock:remove:Mail"
    ]);
  });

  it("skips every App Store app when mas is missing, without asking the provider", async () => {
    const system = new FakeSystem();
    const providers = system.providers();
    let asked = 0;
    const counting: Providers = {
      ...providers,
      appStore: {
        ...providers.appStore,
        isInstalled: async (appId) => {
          asked += 1;
          return providers.appStore.isInstalled(appId);
        }
      }
    };
    const desired = desiredState({
      packages: [
        { kind: "app-store", name: "Xcode", appId: 497799835 },
        { kind: "app-store", name: "Keynote", appId: 409183694 }
      ]
    });

    const plan = await buildPlan(desired, capabilities({ appStore: null }), counting);

    expect(plan.actions.map((action) => action.marker)).toEqual([
      { state: "skip", reason: "capability-missing" },
      { state: "skip", reason: "capability-missing" }
    ]);
    expect(asked).toBe(0);
  });

  it("marks satisfied items as already-satisfied", async () => {
    const system = new FakeSystem();
    system.packages.add("cask:iterm2");
    system.settings.set("com.apple.dock autohide", "1");
    system.identity = { name: "Test User", email: "test@example.com" };
    system.profile.push('export EDITOR="vim"');
    system.extensions.add("golang.go");

    const plan = await buildPlan(
      desiredState({
        packages: [{ kind: "cask", name: "iterm2" }, { kind: "editor-extension", name: "golang.go" }],
        settings: [{ domain: "com.apple.dock", key: "autohide", value: true, type: "bool" }],
        identity: { name: "Test User", email: "test@example.com" },
        shell: { profile: "/tmp/.zshrc", exports: [{ key: "EDITOR", value: "vim" }] }
      }),
      capabilities(),
      system.providers()
    );

    expect(plan.actions.every((action) => action.marker.state === "skip" && action.marker.reason === "already-satisfied")).toBe(
      true
    );
    expect(plan.actions).toHaveLength(5);
  });

  it("skips a dock replace that has already happened", async () => {
    const system = new FakeSystem();
    system.dock = [entryFor("/Applications/Arc.app"), entryFor("/Applications/Mail.app")];

    const plan = await buildPlan(
      desiredState({ dock: [{ type: "replace", add: "/Applications/Arc.app", replace: "Safari" }] }),
      capabilities(),
      system.providers()
    );

    expect(plan.actions[0]?.marker).toEqual({ state: "skip", reason: "already-satisfied" });
  });

  it("skips a dock replace whose target is neither in the Dock nor added", async () => {
    const system = new FakeSystem();
    const warnings: string[] = [];
    const logger = { debug: () => {}, info: () => {}, warn: (msg: string) => warnings.push(msg), error: () => {} };

    const plan = await buildPlan(
      desiredState({ dock: [{ type: "replace", add: "/Applications/Arc.app", replace: "Safari" }] }),
      capabilities(),
      system.providers(),
      { logger }
    );

    expect(plan.actions[0]?.marker).toEqual({ state: "skip", reason: "missing-reference" });
    expect(warnings).toEqual([
      '[plan] skipping dock:replace:Safari: "Safari" is not in the Dock and nothing in this run adds it'
    ]);
  });

  it("plans a dock replace whose target is in the Dock or added earlier in the run", async () => {
    const docked = new FakeSystem();
    docked.dock = [entryFor("/Applications/Safari.app")];
    const replace = { type: "replace", add: "/Applications/Arc.app", replace: "Safari" } as const;

    const fromDock = await buildPlan(desiredState({ dock: [replace] }), capabilities(), docked.providers());
    const fromAdd = await buildPlan(
      desiredState({ dock: [{ type: "add", path: "/Applications/Safari.app" }, replace] }),
      capabilities(),
      new FakeSystem().providers()
    );

    expect(fromDock.actions.map((action) => action.marker)).toEqual([{ state: "pending" }]);
    expect(fromAdd.actions.map((action) => action.marker)).toEqual([{ state: "pending" }, { state: "pending" }]);
  });

  it("plans an item whose check throws", async () => {
    const providers = new FakeSystem().providers();
    const broken: Providers = {
      ...providers,
      dock: {
        ...providers.dock,
        currentEntries: async () => {
          throw new Error("dockutil crashed");
        }
      }
    };
    const warnings: string[] = [];
    const logger = { debug: () => {}, info: () => {}, warn: (msg: string) => warnings.push(msg), error: () => {} };

    const plan = await buildPlan(desiredState({ dock: [{ type: "remove", name: "Mail" }] }), capabilities(), broken, { logger });

    expect(plan.actions[0]?.marker).toEqual({ state: "pending" });
    expect(warnings).toEqual(["[plan] could not check dock:remove:Mail, planning it anyway: dockutil crashed"]);
  });

  it("reports whether any pending action needs privileges", async () => {
    const system = new FakeSystem();
    const fresh = await buildPlan(
      desiredState({ packages: [{ kind: "privileged-cask", name: "docker" }] }),
      capabilities(),
      system.providers()
    );
    system.packages.add("privileged-cask:docker");
    const settled = await buildPlan(
      desiredState({ packages: [{ kind: "privileged-cask", name: "docker" }] }),
      capabilities(),
      system.providers()
    );
    const unprivileged = await buildPlan(desiredState({ packages: formulae("git") }), capabilities(), system.providers());

    expect(needsPrivilege(fresh)).toBe(true);
    expect(needsPrivilege(settled)).toBe(false);
    expect(needsPrivilege(unprivileged)).toBe(false);
  });

  it("formats one line per action", async () => {
    const system = new FakeSystem();
    system.packages.add("formula:git");

    const plan = await buildPlan(
      desiredState({ packages: [...formulae("git", "curl"), { kind: "privileged-cask", name: "docker" }] }),
      capabilities(),
      system.providers()
    );

    expect(formatPlan(plan)).toBe(
      [
        "- formula: git [skip (already-satisfied)]",
        "- formula: curl [pending]",
        "- privileged-cask: docker [pending] (sudo)"
      ].join("\n")
    );
  });
});
