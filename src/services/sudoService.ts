import { CommandExecutor, PrivilegeBackend } from "../types.js";

export class SudoService implements PrivilegeBackend {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly sudo = "sudo"
  ) {}

  async verify(credential: string | null): Promise<boolean> {
    if (credential === null) {
      return this.nonInteractive();
    }

    const result = await this.runner.run(this.sudo, ["-S", "-v", "-p", ""], { input: `${credential}\n` });
    return result.code === 0;
  }

  async refresh(): Promise<boolean> {
    return this.nonInteractive();
  }

  private async nonInteractive(): Promise<boolean> {
    const result = await this.runner.run(this.sudo, ["-n", "-v"]);
    return result.code === 0;
  }
}
