import { ProviderError } from "../errors.js";
import { CommandExecutor, Identity, IdentityProvider } from "../types.js";
import { commandLine } from "./commandRunner.js";

export class GitService implements IdentityProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly git = "git"
  ) {}

  async current(): Promise<Partial<Identity>> {
    const [name, email] = await Promise.all([this.read("user.name"), this.read("user.email")]);
    return { name, email };
  }

  async set(identity: Identity): Promise<void> {
    await this.write("user.name", identity.name);
    await this.write("user.email", identity.email);
    await this.write("color.ui", "true");
  }

  private async read(key: string): Promise<string | undefined> {
    const result = await this.runner.run(this.git, ["config", "--global", "--get", key]);
    // Exit code 1 means the key is unset.
    return result.code === 0 && result.stdout ? result.stdout : undefined;
  }

  private async write(key: string, value: string): Promise<void> {
    const args = ["config", "--global", key, value];
    const result = await this.runner.run(this.git, args);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || `git config ${key} failed`, commandLine(this.git, args), result.stderr);
    }
  }
}
