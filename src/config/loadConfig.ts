import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { ConfigError, messageOf } from "../errors.js";
import { parseBrewfile } from "../parser/brewfileParser.js";
import { DesiredState, DockAction, PackageKind, PackageSpec } from "../types.js";
import { ProvisionConfig, ProvisionConfigSchema, formatIssues } from "./schema.js";

export const DEFAULT_CONFIG = "provision.json";
export const DEFAULT_PROFILE = ".zshrc";

export interface LoadOptions {
  configPath?: string;
  brewfilePath?: string;
  /** Treat a missing config file as an empty one. */
  optionalConfig?: boolean;
  homeDir?: string;
}

export async function loadDesiredState(options: LoadOptions): Promise<DesiredState> {
  const homeDir = options.homeDir ?? homedir();
  const configPath = options.configPath ? resolve(options.configPath) : undefined;

  let config: ProvisionConfig = ProvisionConfigSchema.parse({});
  if (configPath) {
    const raw = await readSource(configPath, options.optionalConfig ?? false);
    if (raw !== null) {
      config = parseConfig(raw, configPath);
    }
  }

  const packages = packagesFromConfig(config);
  const brewfiles: string[] = [];
  if (config.brewfile && configPath) {
    brewfiles.push(resolve(dirname(configPath), expandHome(config.brewfile, homeDir)));
  }
  if (options.brewfilePath) {
    brewfiles.push(resolve(options.brewfilePath));
  }

  for (const brewfilePath of brewfiles) {
    packages.push(...(await packagesFromBrewfile(brewfilePath)));
  }

  const desired: DesiredState = {
    packages,
    settings: config.settings,
    dock: dockFromConfig(config),
    identity: config.identity,
    shell: {
      profile: profilePath(config.shell?.profile, configPath, homeDir),
      exports: Object.entries(config.shell?.exports ?? {}).map(([key, value]) => ({ key, value }))
    },
    maintenance: config.maintenance
  };

  const issues = validateDesiredState(desired);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid desired state in ${configPath ?? brewfiles.join(", ")}`, issues);
  }

  return desired;
}

export function parseConfig(raw: string, source: string): ProvisionConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config at ${source} is not valid JSON: ${messageOf(error)}`);
  }

  const parsed = ProvisionConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Config at ${source} failed validation`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Uniqueness rules that span sections and sources: names within a kind,
 * App Store ids, and setting keys within a domain.
 */
export function validateDesiredState(desired: DesiredState): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const spec of desired.packages) {
    const key = spec.kind === "app-store" ? `app-store:${spec.appId ?? spec.name}` : `${spec.kind}:${spec.name.toLowerCase()}`;
    if (seen.has(key)) {
      issues.push(`duplicate ${spec.kind} "${spec.kind === "app-store" ? String(spec.appId) : spec.name}"`);
    }
    seen.add(key);
  }

  const settingKeys = new Set<string>();
  for (const setting of desired.settings) {
    const key = `${setting.domain}\u0000${setting.key}`;
    if (settingKeys.has(key)) {
      issues.push(`duplicate setting ${setting.domain} ${setting.key}`);
    }
    settingKeys.add(key);
  }

  const dockKeys = new Set<string>();
  for (const action of desired.dock) {
    const key = action.type === "add" ? `add:${action.path}` : action.type === "remove" ? `remove:${action.name}` : `replace:${action.replace}`;
    if (dockKeys.has(key)) {
      issues.push(`duplicate dock ${action.type} entry ${key.slice(key.indexOf(":") + 1)}`);
    }
    dockKeys.add(key);
  }

  return issues;
}

async function readSource(path: string, optional: boolean): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (optional && isNotFound(error)) {
      return null;
    }
    throw new ConfigError(`Config not found or unreadable at ${path}: ${messageOf(error)}`);
  }
}

async function packagesFromBrewfile(path: string): Promise<PackageSpec[]> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Brewfile not found at ${path}: ${messageOf(error)}`);
  }

  const parsed = parseBrewfile(content);
  if (parsed.errors.length > 0) {
    throw new ConfigError(`Brewfile at ${path} has ${parsed.errors.length} malformed line(s)`, parsed.errors);
  }

  return parsed.entries.map((entry) => {
    const spec: PackageSpec = { kind: entry.kind, name: entry.name };
    if (entry.appId !== undefined) {
      spec.appId = entry.appId;
    }
    if (entry.url !== undefined) {
      spec.url = entry.url;
    }
    return spec;
  });
}

function packagesFromConfig(config: ProvisionConfig): PackageSpec[] {
  const named = (kind: PackageKind, names: string[]): PackageSpec[] => names.map((name) => ({ kind, name }));
  return [
    ...named("tap", config.taps),
    ...named("formula", config.formulae),
    ...named("cask", config.casks),
    ...named("privileged-cask", config.privilegedCasks),
    ...config.appStoreApps.map((app): PackageSpec => ({ kind: "app-store", name: app.name, appId: app.id })),
    ...named("editor-extension", config.editorExtensions)
  ];
}

function dockFromConfig(config: ProvisionConfig): DockAction[] {
  // Adds first, so a replace may target an item this run adds.
  return [
    ...config.dockAdd.map((path): DockAction => ({ type: "add", path })),
    ...config.dockReplace.map((entry): DockAction => ({ type: "replace", add: entry.add, replace: entry.replace })),
    ...config.dockRemove.map((name): DockAction => ({ type: "remove", name }))
  ];
}

/** Relative profile paths are taken from the config's directory, like `brewfile`. */
function profilePath(configured: string | undefined, configPath: string | undefined, homeDir: string): string {
  if (!configured) {
    return join(homeDir, DEFAULT_PROFILE);
  }
  const expanded = expandHome(configured, homeDir);
  return configPath ? resolve(dirname(configPath), expanded) : resolve(expanded);
}

function expandHome(path: string, homeDir: string): string {
  if (path === "~") {
    return homeDir;
  }
  return path.startsWith("~/") ? join(homeDir, path.slice(2)) : path;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
