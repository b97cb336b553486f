import { ProviderError } from "../errors.js";
import { AppStoreProvider, CommandExecutor } from "../types.js";
import { commandLine } from "./commandRunner.js";

const MAS_LIST_RE = /^\s*(\d+)\s+/;
const NOT_SIGNED_IN_RE = /not signed in/i;

export class MasService implements AppStoreProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly mas = "mas"
  ) {}

  async isSignedIn(): Promise<boolean | null> {
    const result = await this.runner.run(this.mas, ["account"]);
    if (result.code === 0 && result.stdout.trim().length > 0) {
      return true;
    }
    return NOT_SIGNED_IN_RE.test(`${result.stdout}\n${result.stderr}`) ? false : null;
  }

  async isInstalled(appId: number): Promise<boolean> {
    const result = await this.runner.run(this.mas, ["list"]);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || "mas list failed", commandLine(this.mas, ["list"]), result.stderr);
    }

    return parseMasList(result.stdout).includes(appId);
  }

  async install(appId: number): Promise<void> {
    const args = ["install", String(appId)];
    const result = await this.runner.run(this.mas, args);
    if (result.code !== 0) {
      throw new ProviderError(result.stderr || `App Store install failed for ${appId}`, commandLine(this.mas, args), result.stderr);
    }
  }
}

export function parseMasList(output: string): number[] {
  const ids: number[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(MAS_LIST_RE);
    if (match?.[1]) {
      ids.push(Number(match[1]));
    }
  }
  return ids;
}
