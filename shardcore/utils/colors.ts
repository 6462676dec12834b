//shardcore/utils/colors.ts

// ANSI colour helpers for console log tags.

export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

// NO_COLOR turns colour off.
const colorDisabled = Boolean(process.env.NO_COLOR);

export function colorize(text: string, color?: ColorCode): string {
  if (!color || colorDisabled) return text;
  return `${color}${text}${Colors.Reset}`;
}
