import type { ContextBlock } from "./context";
import type { AskResponse, SourceRef } from "./types";

export const REFUSAL_TEXT =
  "This assistant is designed to provide factual information about mutual fund schemes only. " +
  "It does not provide investment advice.";

export const WELCOME_TEXT =
  "Hello! I'm your Mutual Fund Facts Assistant. Ask me about a scheme's NAV, expense ratio, " +
  "exit load, minimum SIP, returns, holdings, fund manager or risk metrics.";

export const NO_INFORMATION_TEXT = "I don't have this information in my current database.";

/**
 * Sources for an answer: one per context entry, in context order, never repeating a
 * chunk id.
 */
export function collectSources(context: ContextBlock): SourceRef[] {
  const seen = new Set<string>();
  const out: SourceRef[] = [];
  for (const { chunk } of context.entries) {
    if (seen.has(chunk.id)) continue;
    seen.add(chunk.id);
    out.push({ fund_name: chunk.fundName, url: chunk.sourceUrl, type: chunk.chunkType });
  }
  return out;
}

export function answeredResponse(text: string, context: ContextBlock): AskResponse {
  return { response: text, sources: collectSources(context) };
}

/** Refusals, greetings and "no information" never cite anything. */
export function unsourcedResponse(text: string): AskResponse {
  return { response: text, sources: [] };
}
