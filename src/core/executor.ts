import { ProviderError, messageOf } from "../errors.js";
import { exportLine } from "../services/shellProfileService.js";
import { Action, ActionOutcome, Logger, Plan, Providers } from "../types.js";
import { silentLogger } from "./logger.js";
import { PrivilegeSession } from "./privilegeSession.js";
import { Report } from "./report.js";

const PACKAGE_KINDS = new Set(["tap", "formula", "cask", "privileged-cask"]);

export interface ExecutorOptions {
  providers: Providers;
  session?: PrivilegeSession | null;
  logger?: Logger;
  signal?: AbortSignal;
  /** Runs `brew update/upgrade/cleanup` after at least one package was installed. */
  maintenance?: boolean;
  onStart?: (action: Action) => void;
  onOutcome?: (action: Action, outcome: ActionOutcome) => void;
}

export class ActionExecutor {
  private readonly logger: Logger;
  private signedIn?: Promise<boolean | null>;

  constructor(private readonly options: ExecutorOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async run(plan: Plan, report: Report = new Report()): Promise<Report> {
    const restarts = new Set<string>();
    let installedPackages = 0;

    for (const action of plan.actions) {
      const outcome = await this.outcomeFor(action);
      report.record(action, outcome);
      this.options.onOutcome?.(action, outcome);

      if (outcome.status !== "succeeded") {
        continue;
      }
      if (PACKAGE_KINDS.has(action.kind)) {
        installedPackages += 1;
      }
      if (action.kind === "setting") {
        restarts.add(uiProcessFor(action.setting.domain));
      }
      if (action.kind === "dock") {
        restarts.add("Dock");
      }
    }

    if (!this.options.signal?.aborted) {
      await this.restartUi(restarts);
      if (this.options.maintenance && installedPackages > 0) {
        await this.maintain();
      }
    }

    return report;
  }

  private async outcomeFor(action: Action): Promise<ActionOutcome> {
    if (this.options.signal?.aborted) {
      return { status: "skipped", reason: "interrupted" };
    }

    if (action.marker.state === "skip") {
      return { status: "skipped", reason: action.marker.reason };
    }

    if (action.requiresPrivilege && !this.options.session?.isActive()) {
      this.logger.warn(`[executor] ${action.id} needs administrator privileges, which are not available`);
      return { status: "failed", reason: "privilege-unavailable" };
    }

    if (action.kind === "app-store" && (await this.appStoreSignedIn()) === false) {
      return { status: "failed", reason: "not-signed-in", message: "Sign in to the App Store and run again" };
    }

    this.options.onStart?.(action);
    this.logger.info(`[executor] ${describe(action)}`);
    try {
      await this.apply(action);
      return { status: "succeeded" };
    } catch (error) {
      const message = messageOf(error);
      this.logger.error(`[executor] ${action.id} failed: ${message}`);
      if (error instanceof ProviderError && error.command) {
        this.logger.debug(`[executor] ${action.id} ran: ${error.command}`);
        if (error.stderr) {
          this.logger.debug(`[executor] ${action.id} stderr: ${error.stderr.trim()}`);
        }
      }
      return { status: "failed", reason: "provider-error", message };
    }
  }

  private async apply(action: Action): Promise<void> {
    const { providers } = this.options;
    switch (action.kind) {
      case "tap":
      case "formula":
      case "cask":
      case "privileged-cask":
        return providers.packages.install(action.spec);
      case "app-store":
        if (action.spec.appId === undefined) {
          throw new ProviderError(`App Store app ${action.spec.name} has no id`);
        }
        return providers.appStore.install(action.spec.appId);
      case "editor-extension":
        return providers.editor.install(action.spec.name);
      case "setting":
        return providers.settings.apply(action.setting);
      case "dock":
        return providers.dock.apply(action.dock);
      case "identity":
        return providers.identity.set(action.identity);
      case "shell-export":
        return providers.shell.appendLine(exportLine(action.shellExport.key, action.shellExport.value));
      default: {
        const exhaustive: never = action;
        throw new Error(`Unknown action: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** Resolves to null when sign-in cannot be determined; `mas install` then decides. */
  private appStoreSignedIn(): Promise<boolean | null> {
    this.signedIn ??= this.options.providers.appStore.isSignedIn().then(
      (signedIn) => {
        if (signedIn === null) {
          this.logger.debug("[executor] App Store sign-in state unknown; trying installs anyway");
        }
        return signedIn;
      },
      (error: unknown) => {
        this.logger.warn(`[executor] App Store sign-in check failed: ${messageOf(error)}`);
        return null;
      }
    );
    return this.signedIn;
  }

  private async restartUi(processes: Set<string>): Promise<void> {
    if (processes.size === 0) {
      return;
    }

    if (!this.options.session?.isActive()) {
      this.logger.warn(`[executor] not restarting ${[...processes].join(", ")}: privileges unavailable`);
      return;
    }

    for (const name of processes) {
      try {
        await this.options.providers.processes.restart(name);
        this.logger.info(`[executor] restarted ${name}`);
      } catch (error) {
        this.logger.warn(`[executor] could not restart ${name}: ${messageOf(error)}`);
      }
    }
  }

  private async maintain(): Promise<void> {
    try {
      this.logger.info("[executor] running package maintenance");
      const output = await this.options.providers.packages.maintain();
      this.logger.debug(`[executor] ${output}`);
    } catch (error) {
      this.logger.warn(`[executor] package maintenance failed: ${messageOf(error)}`);
    }
  }
}

export function uiProcessFor(domain: string): string {
  switch (domain) {
    case "com.apple.finder":
      return "Finder";
    case "com.apple.dock":
      return "Dock";
    default:
      return "SystemUIServer";
  }
}

function describe(action: Action): string {
  switch (action.kind) {
    case "tap":
      return `tapping ${action.spec.name}`;
    case "setting":
      return `writing ${action.setting.domain} ${action.setting.key}`;
    case "dock":
    case "identity":
    case "shell-export":
      return `applying ${action.label}`;
    default:
      return `installing ${action.kind} ${action.label}`;
  }
}
