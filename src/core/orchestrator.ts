import {
  Action,
  ActionOutcome,
  Capabilities,
  CredentialPrompt,
  DesiredState,
  Logger,
  Plan,
  PrivilegeBackend,
  Providers
} from "../types.js";
import { ActionExecutor } from "./executor.js";
import { silentLogger } from "./logger.js";
import { buildPlan, needsPrivilege } from "./planBuilder.js";
import { PrivilegeSession } from "./privilegeSession.js";
import { Report } from "./report.js";

export interface RunOptions {
  desired: DesiredState;
  capabilities: Capabilities;
  providers: Providers;
  privilege: PrivilegeBackend;
  prompt: CredentialPrompt;
  logger?: Logger;
  signal?: AbortSignal;
  dryRun?: boolean;
  refreshIntervalMs?: number;
  onPlan?: (plan: Plan) => void;
  onStart?: (action: Action) => void;
  onOutcome?: (action: Action, outcome: ActionOutcome) => void;
}

export interface RunResult {
  plan: Plan;
  report: Report;
  interrupted: boolean;
  exitCode: number;
}

export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Plan, then execute. A PrivilegeError from `acquire` propagates before any
 * action runs; the session is torn down on every path out of here.
 */
export async function runProvisioning(options: RunOptions): Promise<RunResult> {
  const logger = options.logger ?? silentLogger();
  const plan = await buildPlan(options.desired, options.capabilities, options.providers, { logger });
  options.onPlan?.(plan);

  const report = new Report();
  if (options.dryRun) {
    return { plan, report, interrupted: false, exitCode: 0 };
  }

  const session = new PrivilegeSession(options.privilege, {
    refreshIntervalMs: options.refreshIntervalMs,
    logger
  });

  try {
    if (needsPrivilege(plan)) {
      if (!options.capabilities.privilege) {
        logger.warn("[run] sudo was not found; privileged actions will fail");
      } else {
        await acquireUnlessInterrupted(session, options, logger);
      }
    }

    const executor = new ActionExecutor({
      providers: options.providers,
      session,
      logger,
      signal: options.signal,
      maintenance: options.desired.maintenance,
      onStart: options.onStart,
      onOutcome: options.onOutcome
    });
    await executor.run(plan, report);
  } finally {
    session.terminate();
  }

  const interrupted = options.signal?.aborted ?? false;
  return {
    plan,
    report,
    interrupted,
    exitCode: interrupted ? INTERRUPTED_EXIT_CODE : report.exitCode()
  };
}

// A prompt cancelled by C-c comes back empty; that is an interrupt, not a refusal.
async function acquireUnlessInterrupted(session: PrivilegeSession, options: RunOptions, logger: Logger): Promise<void> {
  try {
    await session.acquire(options.prompt);
  } catch (error) {
    if (!options.signal?.aborted) {
      throw error;
    }
    logger.warn("[run] interrupted while acquiring privileges");
  }
}
