import blessed from "blessed";
import { Action, ActionOutcome, Logger, Plan } from "../types.js";

interface RunViewOptions {
  debug?: boolean;
  onInterrupt: () => void;
}

type RowState = "pending" | "running" | ActionOutcome["status"] | "skip";

const GLYPHS: Record<RowState, string> = {
  pending: " ",
  skip: "-",
  running: ">",
  succeeded: "+",
  skipped: "-",
  failed: "x"
};

const HELP = "C-c/q:interrupt  j/k:scroll plan";

export class RunView {
  private readonly screen = blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: "macprovision"
  });

  private readonly list = blessed.list({
    parent: this.screen,
    top: 0,
    left: 0,
    width: "50%",
    height: "92%",
    border: "line",
    label: " Plan ",
    keys: false,
    vi: false,
    mouse: true,
    scrollbar: {
      ch: " "
    },
    style: {
      selected: {
        bg: "blue",
        fg: "white"
      }
    }
  });

  private readonly logPane = blessed.log({
    parent: this.screen,
    top: 0,
    left: "50%",
    width: "50%",
    height: "92%",
    border: "line",
    label: " Log ",
    tags: false,
    scrollable: true,
    alwaysScroll: true,
    scrollback: 2000,
    mouse: true
  });

  private readonly footer = blessed.box({
    parent: this.screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: "8%",
    border: "line",
    tags: false,
    content: HELP
  });

  private readonly secret = blessed.textbox({
    parent: this.screen,
    border: "line",
    height: 3,
    width: "60%",
    top: "center",
    left: "center",
    label: " Administrator password ",
    censor: true,
    keys: true,
    hidden: true
  });

  private actions: readonly Action[] = [];
  private readonly rows = new Map<string, RowState>();
  private destroyed = false;

  constructor(private readonly options: RunViewOptions) {}

  start(): void {
    this.screen.key(["q", "C-c"], () => this.interrupt());
    // The password box grabs the keyboard while it reads.
    this.secret.key(["C-c"], () => this.interrupt());

    this.screen.key(["j", "down"], () => this.moveSelection(1));
    this.screen.key(["k", "up"], () => this.moveSelection(-1));

    this.setStatus("Probing tools and building plan...");
    this.screen.render();
  }

  showPlan(plan: Plan): void {
    this.actions = plan.actions;
    for (const action of plan.actions) {
      this.rows.set(action.id, action.marker.state === "pending" ? "pending" : "skip");
    }
    const pending = plan.actions.filter((action) => action.marker.state === "pending").length;
    this.renderRows();
    this.setStatus(`${plan.actions.length} action(s), ${pending} to run.`);
    this.screen.render();
  }

  markRunning(action: Action): void {
    this.rows.set(action.id, "running");
    const index = this.actions.findIndex((candidate) => candidate.id === action.id);
    if (index >= 0) {
      this.list.select(index);
    }
    this.renderRows();
    this.setStatus(`Running ${action.label}...`);
    this.screen.render();
  }

  markOutcome(action: Action, outcome: ActionOutcome): void {
    this.rows.set(action.id, outcome.status);
    this.renderRows();
    if (outcome.status === "failed") {
      this.logPane.log(`${action.label}: failed (${outcome.reason})${outcome.message ? ` ${outcome.message}` : ""}`);
    }
    this.screen.render();
  }

  logger(): Logger {
    const write = (line: string) => {
      this.logPane.log(line);
      this.screen.render();
    };
    return {
      debug: (msg) => {
        if (this.options.debug) {
          write(`[debug] ${msg}`);
        }
      },
      info: (msg) => write(msg),
      warn: (msg) => write(`[warn] ${msg}`),
      error: (msg) => write(`[error] ${msg}`)
    };
  }

  askSecret(): Promise<string | null> {
    return new Promise((resolve) => {
      this.setStatus("Enter the administrator password (esc to cancel).");
      this.secret.clearValue();
      this.secret.show();
      this.secret.focus();
      this.screen.render();
      this.secret.readInput((error: unknown, value?: string) => {
        this.secret.clearValue();
        this.secret.hide();
        this.screen.render();
        resolve(error || typeof value !== "string" ? null : value);
      });
    });
  }

  /** Restores the terminal (cursor, echo, alternate buffer). Safe to call twice. */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.screen.destroy();
  }

  private interrupt(): void {
    if (!this.secret.hidden) {
      this.secret.cancel();
    }
    this.setStatus("Interrupting after the current action...");
    this.screen.render();
    this.options.onInterrupt();
  }

  private moveSelection(delta: number): void {
    if (this.actions.length === 0) {
      return;
    }

    const current = this.selectedIndex();
    this.list.select(Math.max(0, Math.min(this.actions.length - 1, current + delta)));
    this.screen.render();
  }

  private renderRows(): void {
    if (this.actions.length === 0) {
      this.list.setItems(["(nothing requested)"]);
      return;
    }

    const selected = this.selectedIndex();
    this.list.setItems(
      this.actions.map((action) => `${GLYPHS[this.rows.get(action.id) ?? "pending"]} [${action.kind}] ${action.label}`)
    );
    this.list.select(selected);
  }

  private selectedIndex(): number {
    const list = this.list as unknown as { selected?: number };
    return list.selected ?? 0;
  }

  private setStatus(message: string): void {
    const debugHint = this.options.debug ? "  [debug]" : "";
    this.footer.setContent(`${HELP}\n${message}${debugHint}`);
  }
}
