import { describe, expect, it } from "vitest";
import { ROUTING_RULES, ROUTING_TABLE_VERSION, routeQuery, type RoutingRule } from "./router";
import { CHUNK_TYPES } from "./types";

describe("routeQuery", () => {
  it("routes an expense question to expense_information only", () => {
    expect(routeQuery("What is the expense ratio of UTI ELSS Tax Saver Fund?")).toEqual([
      "expense_information",
    ]);
  });

  it("routes NAV and exit load to nav_sip_information", () => {
    expect(routeQuery("What is the NAV and exit load of UTI ELSS Tax Saver Fund?")).toEqual([
      "nav_sip_information",
    ]);
  });

  it("returns every matching type in table order", () => {
    expect(routeQuery("What is the expense ratio and beta of UTI ELSS Tax Saver Fund?")).toEqual([
      "expense_information",
      "risk_metrics",
    ]);
  });

  it("matches case-insensitively", () => {
    expect(routeQuery("EXPENSE RATIO please")).toEqual(["expense_information"]);
  });

  it("falls back to every chunk type when nothing matches", () => {
    expect(routeQuery("Tell me about Meridian Flexi Cap Fund")).toEqual([...CHUNK_TYPES]);
  });

  it("follows the order of the rules it is given", () => {
    const rules: RoutingRule[] = [
      { chunkType: "risk_metrics", keywords: ["beta"] },
      { chunkType: "expense_information", keywords: ["expense"] },
    ];
    expect(routeQuery("expense and beta", rules)).toEqual(["risk_metrics", "expense_information"]);
  });

  it("ships a versioned table covering every chunk type", () => {
    expect(ROUTING_TABLE_VERSION).toBe(1);
    expect(new Set(ROUTING_RULES.map((r) => r.chunkType))).toEqual(new Set(CHUNK_TYPES));
  });
});
