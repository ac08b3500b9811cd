import type { ClargEntryView, ClargHelpModel, ClargHelpOptions } from "./types.js";

type Style = Record<"bold" | "dim" | "yellow" | "cyan", (text: string) => string>;

const ansi: Style = {
  bold: (t) => `\x1b[1m${t}\x1b[0m`,
  dim: (t) => `\x1b[90m${t}\x1b[0m`,
  yellow: (t) => `\x1b[33m${t}\x1b[0m`,
  cyan: (t) => `\x1b[36m${t}\x1b[0m`,
};

const plain: Style = {
  bold: (t) => t,
  dim: (t) => t,
  yellow: (t) => t,
  cyan: (t) => t,
};

// Below this many columns, descriptions are left on one line.
const MIN_DESCRIPTION_WIDTH = 20;

/**
 * Greedy word wrap. A word longer than `width` gets a line of its own.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }

  lines.push(line);
  return lines;
}

const placeholderName = (entry: ClargEntryView) =>
  entry.long ? entry.long.slice(2) : entry.short.slice(1);

function placeholder(entry: ClargEntryView) {
  const name = entry.kind === "list" ? `${placeholderName(entry)}...` : placeholderName(entry);
  return entry.required ? `<${name}>` : `[${name}]`;
}

function renderRow(entry: ClargEntryView, model: ClargHelpModel, style: Style, width: number) {
  // --- LEFT COLUMN ---
  let leftRaw = "";
  let leftStyled = "";

  if (model.longestShort > 0) {
    const short = entry.short.padEnd(model.longestShort);
    leftRaw += `[${short}] `;
    leftStyled += `[${style.yellow(short)}] `;
  }

  const long = entry.long.padEnd(model.longestLong);
  const value = entry.display.padStart(model.longestValue);
  leftRaw += `${long} (${value}) : `;
  leftStyled += `${style.yellow(long)} (${style.dim(value)}) : `;

  // --- RIGHT COLUMN ---
  const notes: string[] = [];
  if (entry.allowed) notes.push(`(choices: ${entry.allowed.join("|")})`);
  if (entry.required) notes.push("(required)");
  const text = [entry.description, ...notes].filter(Boolean).join(" ");

  const indent = 2 + leftRaw.length;
  const room = width - indent;
  const [first = "", ...rest] = room >= MIN_DESCRIPTION_WIDTH ? wrapText(text, room) : [text];

  return [`  ${leftStyled}${first}`.trimEnd(), ...rest.map((line) => `${" ".repeat(indent)}${line}`)];
}

/**
 * Lays out help text from a registry snapshot. Entries keep their registration order,
 * and each separator starts a new group.
 */
export function formatHelp(model: ClargHelpModel, options: ClargHelpOptions = {}) {
  const { name = "cli", description, color = false, width = 80 } = options;
  const style = color ? ansi : plain;
  const lines: string[] = [];

  if (description) lines.push(description, "");

  let usage = `${style.dim("$")} ${name}`;
  if (model.entries.some((e) => e.kind === "value" || e.kind === "toggle" || e.kind === "multi")) {
    usage += ` ${style.yellow("[options]")}`;
  }
  for (const entry of model.entries) {
    if (entry.kind === "positional" || entry.kind === "list") {
      usage += ` ${style.cyan(placeholder(entry))}`;
    }
  }

  lines.push(style.bold("USAGE"), `  ${usage}`, "");
  lines.push(style.bold("OPTIONS"));

  model.entries.forEach((entry, index) => {
    if (entry.kind === "separator") {
      if (index > 0) lines.push("");
      lines.push(style.bold(entry.description));
      return;
    }
    lines.push(...renderRow(entry, model, style, width));
  });

  return lines.join("\n");
}
