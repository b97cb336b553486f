import { ProviderError } from "../errors.js";
import { CommandExecutor, SettingSpec, SettingsProvider } from "../types.js";
import { commandLine } from "./commandRunner.js";

const TRUE_VALUES = new Set(["1", "true", "yes"]);
const FALSE_VALUES = new Set(["0", "false", "no"]);

export class DefaultsService implements SettingsProvider {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly defaults = "defaults"
  ) {}

  async currentValue(setting: SettingSpec): Promise<string | null> {
    const result = await this.runner.run(this.defaults, ["read", setting.domain, setting.key]);
    // `defaults read` exits 1 when the domain or key does not exist yet.
    if (result.code !== 0) {
      return null;
    }
    return result.stdout;
  }

  async apply(setting: SettingSpec): Promise<void> {
    const args = ["write", setting.domain, setting.key, `-${setting.type}`, formatValue(setting)];
    const result = await this.runner.run(this.defaults, args);
    if (result.code !== 0) {
      throw new ProviderError(
        result.stderr || `defaults write failed for ${setting.domain} ${setting.key}`,
        commandLine(this.defaults, args),
        result.stderr
      );
    }
  }
}

export function formatValue(setting: SettingSpec): string {
  if (setting.type === "bool") {
    return setting.value === true || TRUE_VALUES.has(String(setting.value).toLowerCase()) ? "true" : "false";
  }
  return String(setting.value);
}

/**
 * Compares the text printed by `defaults read` with the desired value using the
 * setting's declared type.
 */
export function settingMatches(setting: SettingSpec, current: string | null): boolean {
  if (current === null) {
    return false;
  }

  const actual = current.trim();
  switch (setting.type) {
    case "bool": {
      const lowered = actual.toLowerCase();
      const desired = formatValue(setting) === "true";
      return desired ? TRUE_VALUES.has(lowered) : FALSE_VALUES.has(lowered);
    }
    case "int":
    case "float": {
      const parsed = Number(actual);
      return actual.length > 0 && Number.isFinite(parsed) && parsed === Number(setting.value);
    }
    case "string":
      return actual === String(setting.value);
    default: {
      const exhaustive: never = setting.type;
      throw new Error(`Unknown setting type: ${String(exhaustive)}`);
    }
  }
}
