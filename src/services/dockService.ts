import { basename } from "node:path";
import { ProviderError } from "../errors.js";
import { CommandExecutor, DockAction, DockEntry, DockProvider } from "../types.js";
import { commandLine } from "./commandRunner.js";

export class DockService implements DockProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly dockutil = "dockutil"
  ) {}

  async currentEntries(): Promise<DockEntry[]> {
    const result = await this.runner.run(this.dockutil, ["--list"]);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || "dockutil --list failed", commandLine(this.dockutil, ["--list"]), result.stderr);
    }

    return parseDockList(result.stdout);
  }

  async apply(action: DockAction): Promise<void> {
    const args = [...dockArgs(action), "--no-restart"];
    const result = await this.runner.run(this.dockutil, args);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || `dockutil ${action.type} failed`, commandLine(this.dockutil, args), result.stderr);
    }
  }
}

function dockArgs(action: DockAction): string[] {
  switch (action.type) {
    case "add":
      return ["--add", action.path];
    case "remove":
      return ["--remove", action.name];
    case "replace":
      return ["--add", action.add, "--replacing", action.replace];
    default: {
      const exhaustive: never = action;
      throw new Error(`Unknown dock action: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** `dockutil --list` prints one tab-separated line per item: label, url, section, plist. */
export function parseDockList(output: string): DockEntry[] {
  const entries: DockEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }
    const [label = "", url = ""] = line.split("\t");
    entries.push({ label: label.trim(), url: url.trim() });
  }
  return entries;
}

export function dockLabelFor(pathOrName: string): string {
  const trimmed = pathOrName.replace(/\/+$/, "");
  return basename(trimmed).replace(/\.app$/i, "");
}

export function dockHasItem(entries: DockEntry[], pathOrName: string): boolean {
  const label = dockLabelFor(pathOrName).toLowerCase();
  const normalizedPath = pathOrName.replace(/\/+$/, "");
  return entries.some((entry) => {
    if (entry.label.toLowerCase() === label) {
      return true;
    }
    return urlPath(entry.url) === normalizedPath;
  });
}

export function dockActionSatisfied(entries: DockEntry[], action: DockAction): boolean {
  switch (action.type) {
    case "add":
      return dockHasItem(entries, action.path);
    case "remove":
      return !dockHasItem(entries, action.name);
    case "replace":
      return dockHasItem(entries, action.add) && !dockHasItem(entries, action.replace);
    default: {
      const exhaustive: never = action;
      throw new Error(`Unknown dock action: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function urlPath(url: string): string | undefined {
  if (!url.startsWith("file://")) {
    return undefined;
  }
  try {
    return decodeURIComponent(new URL(url).pathname).replace(/\/+$/, "");
  } catch {
    return undefined;
  }
}
