import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { Capabilities, CapabilityName, CommandExecutor } from "../types.js";

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  "packageManager",
  "appStore",
  "editor",
  "dock",
  "defaults",
  "git",
  "privilege",
  "processControl"
];

interface ToolLookup {
  command: string;
  fallbacks: string[];
}

export const TOOLS: Record<CapabilityName, ToolLookup> = {
  packageManager: { command: "brew", fallbacks: ["/opt/homebrew/bin/brew", "/usr/local/bin/brew"] },
  appStore: { command: "mas", fallbacks: ["/opt/homebrew/bin/mas", "/usr/local/bin/mas"] },
  editor: {
    command: "code",
    fallbacks: ["/usr/local/bin/code", "/Applications/Visual Studio Code.app/Contents/Resources/app/bin/code"]
  },
  dock: { command: "dockutil", fallbacks: ["/opt/homebrew/bin/dockutil", "/usr/local/bin/dockutil"] },
  defaults: { command: "defaults", fallbacks: ["/usr/bin/defaults"] },
  git: { command: "git", fallbacks: ["/usr/bin/git", "/opt/homebrew/bin/git"] },
  privilege: { command: "sudo", fallbacks: ["/usr/bin/sudo"] },
  processControl: { command: "killall", fallbacks: ["/usr/bin/killall"] }
};

export interface ProbeOptions {
  isExecutable?: (path: string) => Promise<boolean>;
}

/**
 * Resolves every known tool to an absolute path, or null. Read-only; absence is
 * an ordinary result and nothing here throws.
 */
export async function probeCapabilities(runner: CommandExecutor, options: ProbeOptions = {}): Promise<Capabilities> {
  const isExecutable = options.isExecutable ?? defaultIsExecutable;
  const found: Record<CapabilityName, string | null> = {
    packageManager: null,
    appStore: null,
    editor: null,
    dock: null,
    defaults: null,
    git: null,
    privilege: null,
    processControl: null
  };

  for (const name of CAPABILITY_NAMES) {
    found[name] = await locate(runner, TOOLS[name], isExecutable);
  }

  return Object.freeze(found);
}

async function locate(
  runner: CommandExecutor,
  tool: ToolLookup,
  isExecutable: (path: string) => Promise<boolean>
): Promise<string | null> {
  try {
    const result = await runner.run("which", [tool.command]);
    const path = result.stdout.split(/\r?\n/)[0]?.trim();
    if (result.code === 0 && path) {
      return path;
    }
  } catch {
    // `which` itself may be missing; fall through to the known locations.
  }

  for (const candidate of tool.fallbacks) {
    if (await isExecutable(candidate).catch(() => false)) {
      return candidate;
    }
  }
  return null;
}

async function defaultIsExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function describeCapabilities(capabilities: Capabilities): string {
  return CAPABILITY_NAMES
    .map((name) => `${name}=${capabilities[name] ?? "absent"}`)
    .join(" ");
}
