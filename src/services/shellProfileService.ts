import { appendFile, readFile } from "node:fs/promises";
import { ProviderError, messageOf } from "../errors.js";
import { ShellProfileProvider } from "../types.js";

export class ShellProfileService implements ShellProfileProvider {
  constructor(private readonly profilePath: string) {}

  async hasLine(line: string): Promise<boolean> {
    const content = await this.read();
    return content.split(/\r?\n/).some((existing) => existing.trim() === line.trim());
  }

  async appendLine(line: string): Promise<void> {
    const content = await this.read();
    const prefix = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
    try {
      await appendFile(this.profilePath, `${prefix}${line}\n`, "utf8");
    } catch (error) {
      throw new ProviderError(`Could not write ${this.profilePath}: ${messageOf(error)}`);
    }
  }

  private async read(): Promise<string> {
    try {
      return await readFile(this.profilePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return "";
      }
      throw new ProviderError(`Could not read ${this.profilePath}: ${messageOf(error)}`);
    }
  }
}

export function exportLine(key: string, value: string): string {
  return `export ${key}="${value}"`;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
