import { ProviderError } from "../errors.js";
import { CommandExecutor, EditorExtensionProvider } from "../types.js";
import { commandLine } from "./commandRunner.js";

export class EditorService implements EditorExtensionProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly code = "code"
  ) {}

  async isInstalled(extensionId: string): Promise<boolean> {
    const args = ["--list-extensions"];
    const result = await this.runner.run(this.code, args);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || "Listing editor extensions failed", commandLine(this.code, args), result.stderr);
    }

    // Marketplace ids are case-insensitive.
    const needle = extensionId.toLowerCase();
    return result.stdout.split(/\r?\n/).some((line) => line.trim().toLowerCase() === needle);
  }

  async install(extensionId: string): Promise<void> {
    const args = ["--install-extension", extensionId];
    const result = await this.runner.run(this.code, args);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || `Extension install failed for ${extensionId}`, commandLine(this.code, args), result.stderr);
    }
  }
}
