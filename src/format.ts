import type { ChunkType, FactData, FactValue } from "./types";

const ACRONYMS: Record<string, string> = {
  nav: "NAV",
  sip: "SIP",
  aum: "AUM",
  elss: "ELSS",
  idcw: "IDCW",
  pe: "PE",
  pb: "PB",
  cagr: "CAGR",
};

/** `expense_ratio` -> `Expense Ratio`, `min_sip` -> `Min SIP`. */
export function humanizeKey(key: string): string {
  return key
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((w) => ACRONYMS[w.toLowerCase()] ?? w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function chunkTypeLabel(type: ChunkType): string {
  return humanizeKey(type);
}

function isScalar(v: FactValue): v is string | number | boolean | null {
  return v === null || typeof v !== "object";
}

function isList(v: FactValue): v is readonly FactValue[] {
  return Array.isArray(v);
}

/** Literal rendering: strings as-is, everything else (null included) through String(). */
export function scalarText(v: string | number | boolean | null): string {
  return String(v);
}

function inlineValue(v: FactValue): string {
  if (isScalar(v)) return scalarText(v);
  if (isList(v)) return v.map(inlineValue).join(", ");
  return Object.entries(v)
    .map(([k, x]) => `${humanizeKey(k)}: ${inlineValue(x)}`)
    .join(", ");
}

/**
 * Render a chunk's data as indented `Label: value` lines. Values are printed verbatim;
 * nested maps get one line per entry and lists one line per item.
 */
export function formatFactLines(data: FactData, indent: string, bullet = ""): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    const label = `${indent}${bullet}${humanizeKey(key)}`;
    if (isScalar(value)) {
      lines.push(`${label}: ${scalarText(value)}`);
    } else if (isList(value)) {
      lines.push(`${label}:`);
      for (const item of value) lines.push(`${indent}  - ${inlineValue(item)}`);
    } else {
      lines.push(`${label}:`);
      for (const [k, v] of Object.entries(value)) {
        lines.push(`${indent}  ${humanizeKey(k)}: ${inlineValue(v)}`);
      }
    }
  }
  return lines;
}
