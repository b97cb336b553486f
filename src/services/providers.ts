import { Capabilities, CommandExecutor, Providers } from "../types.js";
import { BrewService } from "./brewService.js";
import { DefaultsService } from "./defaultsService.js";
import { DockService } from "./dockService.js";
import { EditorService } from "./editorService.js";
import { GitService } from "./gitService.js";
import { MasService } from "./masService.js";
import { ProcessService } from "./processService.js";
import { ShellProfileService } from "./shellProfileService.js";

/** Binds each service to the executable the probe found, or its bare name. */
export function createProviders(runner: CommandExecutor, capabilities: Capabilities, profilePath: string): Providers {
  return {
    packages: new BrewService(runner, capabilities.packageManager ?? "brew"),
    appStore: new MasService(runner, capabilities.appStore ?? "mas"),
    editor: new EditorService(runner, capabilities.editor ?? "code"),
    settings: new DefaultsService(runner, capabilities.defaults ?? "defaults"),
    dock: new DockService(runner, capabilities.dock ?? "dockutil"),
    identity: new GitService(runner, capabilities.git ?? "git"),
    shell: new ShellProfileService(profilePath),
    processes: new ProcessService(runner, capabilities.processControl ?? "killall")
  };
}
