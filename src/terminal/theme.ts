import type { StyleName } from "../pipeline/record.js";

const ANSI: Record<StyleName | "bold" | "reset", string> = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
};

const ANSI_RE = /\x1b\[[0-9;]*m/g;

/** Colour is on for a TTY unless NO_COLOR is set; FORCE_COLOR wins over both. */
export function shouldUseColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.FORCE_COLOR && env.FORCE_COLOR !== "0") return true;
  if (env.NO_COLOR) return false;
  return stream.isTTY === true;
}

export function colorize(style: StyleName | "bold", text: string, enabled = true): string {
  if (!enabled || text.length === 0) return text;
  return `${ANSI[style]}${text}${ANSI.reset}`;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, "");
}

export type Theme = {
  error: (text: string) => string;
  warn: (text: string) => string;
  success: (text: string) => string;
  muted: (text: string) => string;
  accent: (text: string) => string;
  heading: (text: string) => string;
};

export function createTheme(enabled: boolean): Theme {
  return {
    error: (text) => colorize("red", text, enabled),
    warn: (text) => colorize("yellow", text, enabled),
    success: (text) => colorize("green", text, enabled),
    muted: (text) => colorize("gray", text, enabled),
    accent: (text) => colorize("cyan", text, enabled),
    heading: (text) => colorize("bold", text, enabled),
  };
}

export const theme: Theme = createTheme(shouldUseColor());
