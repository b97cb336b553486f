export class ProvisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends ProvisionError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
  }
}

export class PrivilegeError extends ProvisionError {}

/**
 * A single external tool call that exited non-zero. Recorded against the action
 * that issued it; never stops the run.
 */
export class ProviderError extends ProvisionError {
  constructor(
    message: string,
    readonly command?: string,
    readonly stderr?: string
  ) {
    super(message);
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
