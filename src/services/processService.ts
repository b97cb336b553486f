import { ProviderError } from "../errors.js";
import { CommandExecutor, ProcessControl } from "../types.js";
import { commandLine } from "./commandRunner.js";

export class ProcessService implements ProcessControl {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly killall = "killall"
  ) {}

  async restart(processName: string): Promise<void> {
    // launchd brings Finder, Dock and SystemUIServer straight back up.
    const result = await this.runner.run(this.killall, [processName]);
    if (result.code !== 0) {
      throw new ProviderError(
        result.stderr || `Could not restart ${processName}`,
        commandLine(this.killall, [processName]),
        result.stderr
      );
    }
  }
}
