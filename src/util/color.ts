import { InvalidCommandError } from "./errors.js";
import type { Rgb } from "./types.js";

const hex2 = (n: number) => n.toString(16).toUpperCase().padStart(2, "0");

export function formatRgb(c: Rgb): string {
  return `#${hex2(c.r)}${hex2(c.g)}${hex2(c.b)}`;
}

/** Returns null for anything that is not `#RRGGBB`, `RRGGBB`, `#RGB` or `RGB`. */
export function tryParseRgb(input: string): Rgb | null {
  let s = input.trim().replace(/^#/, "");
  if (/^[0-9a-fA-F]{3}$/.test(s)) s = s.split("").map((ch) => ch + ch).join("");
  if (!/^[0-9a-fA-F]{6}$/.test(s)) return null;
  return {
    r: parseInt(s.slice(0, 2), 16),
    g: parseInt(s.slice(2, 4), 16),
    b: parseInt(s.slice(4, 6), 16),
  };
}

export function parseRgb(input: string): Rgb {
  const c = tryParseRgb(input);
  if (!c) throw new InvalidCommandError(`invalid color "${input}", expected #RRGGBB`);
  return c;
}
