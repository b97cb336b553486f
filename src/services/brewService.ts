import { ProviderError } from "../errors.js";
import { CommandExecutor, PackageProvider, PackageSpec } from "../types.js";
import { commandLine } from "./commandRunner.js";

export class BrewService implements PackageProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly brew = "brew"
  ) {}

  async isInstalled(spec: PackageSpec): Promise<boolean> {
    if (spec.kind === "tap") {
      const result = await this.runner.run(this.brew, ["tap"]);
      if (result.code !== 0) {
        throw new ProviderError(result.stderr || "brew tap failed", commandLine(this.brew, ["tap"]), result.stderr);
      }
      const needle = spec.name.toLowerCase();
      return result.stdout.split(/\r?\n/).some((line) => line.trim().toLowerCase() === needle);
    }

    const result = await this.runner.run(this.brew, listArgs(spec));
    return result.code === 0;
  }

  async install(spec: PackageSpec): Promise<void> {
    const args = installArgs(spec);
    const result = await this.runner.run(this.brew, args);
    if (result.code !== 0) {
      throw new ProviderError(
        result.stderr || `Install failed for ${spec.kind} ${spec.name}`,
        commandLine(this.brew, args),
        result.stderr
      );
    }
  }

  async maintain(): Promise<string> {
    const outputs: string[] = [];
    for (const step of ["update", "upgrade", "cleanup"]) {
      const result = await this.runner.run(this.brew, [step]);
      if (result.code !== 0) {
        throw new ProviderError(result.stderr || `brew ${step} failed`, commandLine(this.brew, [step]), result.stderr);
      }
      outputs.push(result.stdout || `brew ${step} complete`);
    }

    return outputs.join("\n");
  }
}

function listArgs(spec: PackageSpec): string[] {
  if (spec.kind === "formula") {
    return ["list", "--formula", spec.name];
  }

  if (spec.kind === "cask" || spec.kind === "privileged-cask") {
    return ["list", "--cask", spec.name];
  }

  throw new ProviderError(`Homebrew does not manage ${spec.kind} packages`);
}

function installArgs(spec: PackageSpec): string[] {
  if (spec.kind === "tap") {
    return spec.url ? ["tap", spec.name, spec.url] : ["tap", spec.name];
  }

  if (spec.kind === "formula") {
    return ["install", spec.name];
  }

  if (spec.kind === "cask" || spec.kind === "privileged-cask") {
    return ["install", "--cask", spec.name];
  }

  throw new ProviderError(`Homebrew does not manage ${spec.kind} packages`);
}
