import { PrivilegeError, messageOf } from "../errors.js";
import { CredentialPrompt, Logger, PrivilegeBackend } from "../types.js";
import { silentLogger } from "./logger.js";

export type PrivilegeState = "unacquired" | "active" | "expired" | "terminated";

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;

export interface PrivilegeSessionOptions {
  refreshIntervalMs?: number;
  logger?: Logger;
}

/**
 * One elevated grant for the whole run. Only the refresh loop may move the
 * session from active to expired; the executor just reads `isActive()`.
 */
export class PrivilegeSession {
  private current: PrivilegeState = "unacquired";
  private timer?: NodeJS.Timeout;
  private refreshing = false;
  private readonly refreshIntervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly backend: PrivilegeBackend,
    options: PrivilegeSessionOptions = {}
  ) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger();
  }

  get state(): PrivilegeState {
    return this.current;
  }

  isActive(): boolean {
    return this.current === "active";
  }

  async acquire(prompt: CredentialPrompt): Promise<void> {
    if (this.current !== "unacquired") {
      throw new PrivilegeError(`Cannot acquire privileges from state ${this.current}`);
    }

    if (!(await this.safeVerify(null))) {
      const credential = await prompt();
      if (credential === null) {
        throw new PrivilegeError("Administrator password required but none was provided");
      }
      if (!(await this.safeVerify(credential))) {
        throw new PrivilegeError("Administrator password was rejected");
      }
    }

    // terminate() may have run while we were waiting on the prompt.
    if (this.current !== "unacquired") {
      throw new PrivilegeError("Privilege session was terminated before it became active");
    }

    this.current = "active";
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshIntervalMs);
    this.timer.unref();
    this.logger.debug(`[privilege] session active, refreshing every ${this.refreshIntervalMs}ms`);
  }

  terminate(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.current !== "terminated") {
      this.logger.debug(`[privilege] session terminated (was ${this.current})`);
    }
    this.current = "terminated";
  }

  private async refresh(): Promise<void> {
    if (this.refreshing || this.current !== "active") {
      return;
    }

    this.refreshing = true;
    let alive: boolean;
    try {
      alive = await this.backend.refresh();
    } catch (error) {
      this.logger.warn(`[privilege] refresh failed: ${messageOf(error)}`);
      alive = false;
    } finally {
      this.refreshing = false;
    }

    if (!alive && this.current === "active") {
      this.current = "expired";
      if (this.timer) {
        clearInterval(this.timer);
        this.timer = undefined;
      }
      this.logger.warn("[privilege] session expired; remaining privileged actions will fail");
    }
  }

  private async safeVerify(credential: string | null): Promise<boolean> {
    try {
      return await this.backend.verify(credential);
    } catch (error) {
      throw new PrivilegeError(`Could not verify administrator privileges: ${messageOf(error)}`);
    }
  }
}
