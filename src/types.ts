export type PackageKind = "tap" | "formula" | "cask" | "privileged-cask" | "app-store" | "editor-extension";

export type ActionKind = PackageKind | "setting" | "dock" | "identity" | "shell-export";

export interface PackageSpec {
  kind: PackageKind;
  name: string;
  appId?: number;
  /** Clone URL for a tap that is not on GitHub under the usual name. */
  url?: string;
}

export type SettingType = "string" | "int" | "float" | "bool";

export interface SettingSpec {
  domain: string;
  key: string;
  value: string | number | boolean;
  type: SettingType;
}

export type DockAction =
  | { type: "add"; path: string }
  | { type: "remove"; name: string }
  | { type: "replace"; add: string; replace: string };

export interface DockEntry {
  label: string;
  url: string;
}

export interface Identity {
  name: string;
  email: string;
}

export interface ShellExport {
  key: string;
  value: string;
}

export interface DesiredState {
  packages: PackageSpec[];
  settings: SettingSpec[];
  dock: DockAction[];
  identity?: Identity;
  shell: {
    profile: string;
    exports: ShellExport[];
  };
  maintenance: boolean;
}

export type CapabilityName =
  | "packageManager"
  | "appStore"
  | "editor"
  | "dock"
  | "defaults"
  | "git"
  | "privilege"
  | "processControl";

export type Capabilities = Readonly<Record<CapabilityName, string | null>>;

export type SkipReason = "already-satisfied" | "capability-missing" | "missing-reference" | "interrupted";

export type FailureReason = "provider-error" | "privilege-unavailable" | "not-signed-in";

export type PlanMarker = { state: "pending" } | { state: "skip"; reason: SkipReason };

interface ActionBase {
  id: string;
  label: string;
  requiresPrivilege: boolean;
  capability: CapabilityName | null;
  marker: PlanMarker;
}

export type Action = ActionBase &
  (
    | { kind: PackageKind; spec: PackageSpec }
    | { kind: "setting"; setting: SettingSpec }
    | { kind: "dock"; dock: DockAction }
    | { kind: "identity"; identity: Identity }
    | { kind: "shell-export"; shellExport: ShellExport }
  );

export interface Plan {
  readonly actions: readonly Action[];
  readonly createdAt: string;
}

export type ActionOutcome =
  | { status: "succeeded" }
  | { status: "skipped"; reason: SkipReason }
  | { status: "failed"; reason: FailureReason; message?: string };

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  input?: string;
}

export interface CommandExecutor {
  run(cmd: string, args: string[], options?: RunCommandOptions): Promise<CommandResult>;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface PackageProvider {
  isInstalled(spec: PackageSpec): Promise<boolean>;
  install(spec: PackageSpec): Promise<void>;
  maintain(): Promise<string>;
}

export interface AppStoreProvider {
  /** `null` when the tool cannot tell, as with `mas` releases that dropped `account`. */
  isSignedIn(): Promise<boolean | null>;
  isInstalled(appId: number): Promise<boolean>;
  install(appId: number): Promise<void>;
}

export interface EditorExtensionProvider {
  isInstalled(extensionId: string): Promise<boolean>;
  install(extensionId: string): Promise<void>;
}

export interface SettingsProvider {
  currentValue(setting: SettingSpec): Promise<string | null>;
  apply(setting: SettingSpec): Promise<void>;
}

export interface DockProvider {
  currentEntries(): Promise<DockEntry[]>;
  apply(action: DockAction): Promise<void>;
}

export interface IdentityProvider {
  current(): Promise<Partial<Identity>>;
  set(identity: Identity): Promise<void>;
}

export interface ShellProfileProvider {
  hasLine(line: string): Promise<boolean>;
  appendLine(line: string): Promise<void>;
}

export interface ProcessControl {
  restart(processName: string): Promise<void>;
}

export interface PrivilegeBackend {
  verify(credential: string | null): Promise<boolean>;
  refresh(): Promise<boolean>;
}

export interface Providers {
  packages: PackageProvider;
  appStore: AppStoreProvider;
  editor: EditorExtensionProvider;
  settings: SettingsProvider;
  dock: DockProvider;
  identity: IdentityProvider;
  shell: ShellProfileProvider;
  processes: ProcessControl;
}

export type CredentialPrompt = () => Promise<string | null>;
