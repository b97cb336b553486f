import { pathToFileURL } from "node:url";
import { messageOf } from "../errors.js";
import { dockActionSatisfied, dockHasItem, dockLabelFor } from "../services/dockService.js";
import { settingMatches } from "../services/defaultsService.js";
import { exportLine } from "../services/shellProfileService.js";
import {
  Action,
  ActionKind,
  Capabilities,
  CapabilityName,
  DesiredState,
  DockAction,
  DockEntry,
  Logger,
  PackageSpec,
  Plan,
  PlanMarker,
  Providers,
  SettingSpec
} from "../types.js";
import { silentLogger } from "./logger.js";

/** Installs first, privileged casks last among them, then settings and dock. */
export const KIND_ORDER: readonly ActionKind[] = [
  "tap",
  "formula",
  "cask",
  "privileged-cask",
  "app-store",
  "editor-extension",
  "setting",
  "dock",
  "identity",
  "shell-export"
];

const PRIVILEGED_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>(["privileged-cask", "setting", "dock"]);

const PENDING: PlanMarker = { state: "pending" };

export function capabilityFor(kind: ActionKind): CapabilityName | null {
  switch (kind) {
    case "tap":
    case "formula":
    case "cask":
    case "privileged-cask":
      return "packageManager";
    case "app-store":
      return "appStore";
    case "editor-extension":
      return "editor";
    case "setting":
      return "defaults";
    case "dock":
      return "dock";
    case "identity":
      return "git";
    case "shell-export":
      return null;
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unknown action kind: ${String(exhaustive)}`);
    }
  }
}

export interface BuildPlanOptions {
  logger?: Logger;
  now?: () => Date;
}

export async function buildPlan(
  desired: DesiredState,
  capabilities: Capabilities,
  providers: Providers,
  options: BuildPlanOptions = {}
): Promise<Plan> {
  const logger = options.logger ?? silentLogger();
  const now = options.now ?? (() => new Date());
  const requested = orderActions(requestedActions(desired));
  const checker = new SatisfactionChecker(providers, plannedDockItems(desired.dock));
  const actions: Action[] = [];

  for (const action of requested) {
    const marker = await markerFor(action, capabilities, checker, logger);
    actions.push({ ...action, marker });
  }

  logger.debug(`[plan] ${actions.length} action(s), ${actions.filter((a) => a.marker.state === "pending").length} pending`);
  return { actions, createdAt: now().toISOString() };
}

export function needsPrivilege(plan: Plan): boolean {
  return plan.actions.some((action) => action.requiresPrivilege && action.marker.state === "pending");
}

export function requestedActions(desired: DesiredState): Action[] {
  const actions: Action[] = desired.packages.map(packageAction);

  for (const setting of desired.settings) {
    actions.push({
      ...base("setting", settingId(setting), `${setting.domain} ${setting.key}`),
      kind: "setting",
      setting
    });
  }

  for (const dock of desired.dock) {
    actions.push({ ...base("dock", dockId(dock), dockLabel(dock)), kind: "dock", dock });
  }

  if (desired.identity) {
    const identity = desired.identity;
    actions.push({
      ...base("identity", "identity:git", `git identity ${identity.name} <${identity.email}>`),
      kind: "identity",
      identity
    });
  }

  for (const shellExport of desired.shell.exports) {
    actions.push({
      ...base("shell-export", `shell-export:${shellExport.key}`, `export ${shellExport.key}`),
      kind: "shell-export",
      shellExport
    });
  }

  return actions;
}

function orderActions(actions: Action[]): Action[] {
  // Array#sort is stable, so input order survives within a kind.
  return [...actions].sort((a, b) => KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind));
}

async function markerFor(
  action: Action,
  capabilities: Capabilities,
  checker: SatisfactionChecker,
  logger: Logger
): Promise<PlanMarker> {
  if (action.capability && !capabilities[action.capability]) {
    return { state: "skip", reason: "capability-missing" };
  }

  try {
    if (await checker.isSatisfied(action)) {
      return { state: "skip", reason: "already-satisfied" };
    }
    if (action.kind === "dock" && action.dock.type === "replace" && !(await checker.dockItemKnown(action.dock.replace))) {
      logger.warn(`[plan] skipping ${action.id}: "${action.dock.replace}" is not in the Dock and nothing in this run adds it`);
      return { state: "skip", reason: "missing-reference" };
    }
  } catch (error) {
    logger.warn(`[plan] could not check ${action.id}, planning it anyway: ${messageOf(error)}`);
  }
  return PENDING;
}

class SatisfactionChecker {
  private dockEntries?: Promise<DockEntry[]>;

  constructor(
    private readonly providers: Providers,
    private readonly plannedDock: readonly DockEntry[]
  ) {}

  async isSatisfied(action: Action): Promise<boolean> {
    switch (action.kind) {
      case "tap":
      case "formula":
      case "cask":
      case "privileged-cask":
        return this.providers.packages.isInstalled(action.spec);
      case "app-store":
        return action.spec.appId !== undefined && this.providers.appStore.isInstalled(action.spec.appId);
      case "editor-extension":
        return this.providers.editor.isInstalled(action.spec.name);
      case "setting":
        return settingMatches(action.setting, await this.providers.settings.currentValue(action.setting));
      case "dock":
        return dockActionSatisfied(await this.dockSnapshot(), action.dock);
      case "identity": {
        const current = await this.providers.identity.current();
        return current.name === action.identity.name && current.email === action.identity.email;
      }
      case "shell-export":
        return this.providers.shell.hasLine(exportLine(action.shellExport.key, action.shellExport.value));
      default: {
        const exhaustive: never = action;
        throw new Error(`Unknown action: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** True if the item is in the Dock now or a dock add in this run puts it there. */
  async dockItemKnown(pathOrName: string): Promise<boolean> {
    return dockHasItem([...(await this.dockSnapshot()), ...this.plannedDock], pathOrName);
  }

  // One listing per plan; every dock action is judged against the same snapshot.
  private dockSnapshot(): Promise<DockEntry[]> {
    this.dockEntries ??= this.providers.dock.currentEntries();
    return this.dockEntries;
  }
}

function plannedDockItems(dock: readonly DockAction[]): DockEntry[] {
  const paths = dock.flatMap((action) => (action.type === "add" ? [action.path] : action.type === "replace" ? [action.add] : []));
  return paths.map((path) => ({ label: dockLabelFor(path), url: pathToFileURL(path).href }));
}

function packageAction(spec: PackageSpec): Action {
  const key = spec.kind === "app-store" ? String(spec.appId ?? spec.name) : spec.name;
  return { ...base(spec.kind, `${spec.kind}:${key}`, spec.name), kind: spec.kind, spec };
}

function base(kind: ActionKind, id: string, label: string) {
  return {
    id,
    label,
    requiresPrivilege: PRIVILEGED_KINDS.has(kind),
    capability: capabilityFor(kind),
    marker: PENDING
  };
}

/** Domains and keys may themselves contain `:`, so each part is escaped. */
export function settingId(setting: SettingSpec): string {
  return `setting:${encodeURIComponent(setting.domain)}:${encodeURIComponent(setting.key)}`;
}

function dockId(action: DockAction): string {
  switch (action.type) {
    case "add":
      return `dock:add:${action.path}`;
    case "remove":
      return `dock:remove:${action.name}`;
    case "replace":
      return `dock:replace:${action.replace}`;
    default: {
      const exhaustive: never = action;
      throw new Error(`Unknown dock action: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function dockLabel(action: DockAction): string {
  switch (action.type) {
    case "add":
      return `dock add ${action.path}`;
    case "remove":
      return `dock remove ${action.name}`;
    case "replace":
      return `dock replace ${action.replace} with ${action.add}`;
    default: {
      const exhaustive: never = action;
      throw new Error(`Unknown dock action: ${JSON.stringify(exhaustive)}`);
    }
  }
}
