import { PackageKind } from "../types.js";

const ENTRY_RE = /^(tap|brew|cask|vscode)\s+"([^"]+)"(?:\s*,\s*(.+))?$/;
const MAS_RE = /^mas\s+"([^"]+)"\s*,\s*id:\s*(\d+)(?:\s*,\s*(.+))?$/;
const QUOTED_RE = /^"([^"]+)"$/;

const KEYWORD_KINDS: Record<string, PackageKind> = {
  tap: "tap",
  brew: "formula",
  cask: "cask",
  vscode: "editor-extension"
};

export interface BrewfileEntry {
  kind: PackageKind;
  name: string;
  appId?: number;
  /** Clone URL of a third-party tap (`tap "user/repo", "https://..."`). */
  url?: string;
  lineNumber: number;
}

export interface ParsedBrewfile {
  entries: BrewfileEntry[];
  errors: string[];
}

/**
 * Reads the subset of Brewfile syntax that maps onto a package spec. Options
 * such as `restart_service:` or `args:` have no counterpart and are reported
 * as errors rather than ignored.
 */
export function parseBrewfile(content: string): ParsedBrewfile {
  const lines = content.split(/\r?\n/);
  const entries: BrewfileEntry[] = [];
  const errors: string[] = [];

  for (let i = 0; i < lines.length; i += 1) {
    const line = stripComment(lines[i] ?? "").trim();
    const lineNumber = i + 1;

    if (!line) {
      continue;
    }

    const mas = line.match(MAS_RE);
    if (mas?.[1] && mas[2]) {
      if (mas[3]) {
        errors.push(unsupportedOptions(lineNumber, "mas", mas[1], mas[3]));
        continue;
      }
      entries.push({ kind: "app-store", name: mas[1], appId: Number(mas[2]), lineNumber });
      continue;
    }

    const match = line.match(ENTRY_RE);
    const keyword = match?.[1];
    const name = match?.[2];
    const rest = match?.[3];
    const kind = keyword ? KEYWORD_KINDS[keyword] : undefined;
    if (!keyword || !name || !kind) {
      errors.push(`Line ${lineNumber}: Unsupported or malformed line: ${line}`);
      continue;
    }

    if (!rest) {
      entries.push({ kind, name, lineNumber });
      continue;
    }

    const url = kind === "tap" ? rest.trim().match(QUOTED_RE)?.[1] : undefined;
    if (url) {
      entries.push({ kind, name, url, lineNumber });
      continue;
    }

    errors.push(unsupportedOptions(lineNumber, keyword, name, rest));
  }

  return { entries, errors };
}

function unsupportedOptions(lineNumber: number, keyword: string, name: string, rest: string): string {
  return `Line ${lineNumber}: Unsupported options for ${keyword} "${name}": ${rest.trim()}`;
}

function stripComment(raw: string): string {
  // Brewfiles are Ruby; a `#` outside a string starts a comment.
  let inString = false;
  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];
    if (ch === "\"") {
      inString = !inString;
    } else if (ch === "#" && !inString) {
      return raw.slice(0, i);
    }
  }
  return raw;
}
