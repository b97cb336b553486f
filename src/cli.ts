#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_CONFIG, loadDesiredState } from "./config/loadConfig.js";
import { describeCapabilities, probeCapabilities } from "./core/capabilityProbe.js";
import { formatPlan, formatReport } from "./core/format.js";
import { createConsoleLogger } from "./core/logger.js";
import { runProvisioning } from "./core/orchestrator.js";
import { ConfigError, PrivilegeError } from "./errors.js";
import { ShellCommandRunner } from "./services/commandRunner.js";
import { createProviders } from "./services/providers.js";
import { SudoService } from "./services/sudoService.js";
import { RunView } from "./tui/runView.js";
import { CredentialPrompt, Logger } from "./types.js";

export const USAGE_EXIT_CODE = 2;

export interface CliOptions {
  command: "apply" | "plan";
  configPath: string;
  configExplicit: boolean;
  brewfilePath?: string;
  tui: boolean;
  json: boolean;
  debug: boolean;
  help: boolean;
}

class UsageError extends Error {}

export function parseArgs(args: string[], cwd = process.cwd()): CliOptions {
  const options: CliOptions = {
    command: "apply",
    configPath: resolve(cwd, DEFAULT_CONFIG),
    configExplicit: false,
    tui: true,
    json: false,
    debug: false,
    help: false
  };
  let sawCommand = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    if (arg === "--debug") {
      options.debug = true;
      continue;
    }

    if (arg === "--no-tui") {
      options.tui = false;
      continue;
    }

    if (arg === "--dry-run") {
      options.command = "plan";
      continue;
    }

    if (arg === "--json") {
      options.json = true;
      continue;
    }

    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }

    if (arg === "-c" || arg === "--config" || arg === "--brewfile") {
      const value = args[i + 1];
      if (!value || value.startsWith("-")) {
        throw new UsageError(`${arg} requires a path`);
      }
      if (arg === "--brewfile") {
        options.brewfilePath = resolve(cwd, value);
      } else {
        options.configPath = resolve(cwd, value);
        options.configExplicit = true;
      }
      i += 1;
      continue;
    }

    if ((arg === "apply" || arg === "plan") && !sawCommand) {
      options.command = arg;
      sawCommand = true;
      continue;
    }

    throw new UsageError(`Unknown argument: ${arg}`);
  }

  return options;
}

function printHelp(): void {
  const msg = `
macprovision

Usage:
  macprovision [apply] [--config <path>] [--brewfile <path>] [--no-tui] [--json] [--debug]
  macprovision plan [--config <path>] [--brewfile <path>] [--json]

--dry-run is the same as plan.

Reads ./${DEFAULT_CONFIG} unless --config is given. Exit status is 0 for a clean
run, 1 when any action failed, 2 for configuration or privilege errors and 130
when interrupted.
`;
  process.stdout.write(msg.trimStart());
}

function normalizeTerminalEnv(): void {
  const term = process.env.TERM ?? "";
  const termProgram = process.env.TERM_PROGRAM ?? "";
  const isGhostty = term.toLowerCase().includes("ghostty") || termProgram.toLowerCase().includes("ghostty");

  // blessed has known incompatibilities with some extended terminfo entries from ghostty.
  if (isGhostty) {
    process.env.TERM = "xterm-256color";
  }
}

function plainPrompt(logger: Logger): CredentialPrompt {
  return async () => {
    logger.warn("[run] sudo needs a password; run `sudo -v` first or use the interactive view");
    return null;
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n`);
      return USAGE_EXIT_CODE;
    }
    throw error;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  const interactive = options.tui && options.command === "apply" && !options.json && Boolean(process.stdout.isTTY && process.stdin.isTTY);
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on("SIGINT", onSigint);

  if (interactive) {
    normalizeTerminalEnv();
  }
  const view = interactive ? new RunView({ debug: options.debug, onInterrupt: onSigint }) : undefined;
  const logger = view?.logger() ?? createConsoleLogger({ debug: options.debug });

  try {
    view?.start();
    const desired = await loadDesiredState({
      configPath: options.configPath,
      brewfilePath: options.brewfilePath,
      optionalConfig: !options.configExplicit && Boolean(options.brewfilePath) && !existsSync(options.configPath)
    });

    const runner = new ShellCommandRunner();
    const capabilities = await probeCapabilities(runner);
    logger.debug(`[probe] ${describeCapabilities(capabilities)}`);

    const result = await runProvisioning({
      desired,
      capabilities,
      providers: createProviders(runner, capabilities, desired.shell.profile),
      privilege: new SudoService(runner, capabilities.privilege ?? "sudo"),
      prompt: view ? () => view.askSecret() : plainPrompt(logger),
      logger,
      signal: controller.signal,
      dryRun: options.command === "plan",
      onPlan: (plan) => view?.showPlan(plan),
      onStart: (action) => view?.markRunning(action),
      onOutcome: (action, outcome) => view?.markOutcome(action, outcome)
    });

    view?.destroy();
    if (options.command === "plan") {
      process.stdout.write(`${options.json ? JSON.stringify(result.plan, null, 2) : formatPlan(result.plan)}\n`);
      return result.exitCode;
    }

    const summary = result.report.summary();
    const rendered = options.json
      ? JSON.stringify({ exitCode: result.exitCode, interrupted: result.interrupted, ...summary }, null, 2)
      : `${result.interrupted ? "Interrupted; partial report.\n" : ""}${formatReport(summary)}`;
    process.stdout.write(`${rendered}\n`);
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof PrivilegeError) {
      view?.destroy();
      process.stderr.write(`${error.message}\n`);
      return USAGE_EXIT_CODE;
    }
    throw error;
  } finally {
    view?.destroy();
    process.off("SIGINT", onSigint);
  }
}

function isEntry(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    // npm installs the bin as a symlink.
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntry()) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error(`macprovision failed: ${message}`);
      process.exit(1);
    }
  );
}
