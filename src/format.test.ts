import { describe, expect, it } from "vitest";
import { chunkTypeLabel, formatFactLines, humanizeKey, scalarText } from "./format";

describe("humanizeKey", () => {
  it("title-cases snake_case keys and keeps known acronyms upper-case", () => {
    expect(humanizeKey("expense_ratio")).toBe("Expense Ratio");
    expect(humanizeKey("min_sip")).toBe("Min SIP");
    expect(humanizeKey("nav_date")).toBe("NAV Date");
    expect(humanizeKey("fund size")).toBe("Fund Size");
  });

  it("labels chunk types the same way", () => {
    expect(chunkTypeLabel("nav_sip_information")).toBe("NAV SIP Information");
    expect(chunkTypeLabel("risk_metrics")).toBe("Risk Metrics");
  });
});

describe("scalarText", () => {
  it("prints values verbatim, null included", () => {
    expect(scalarText("0.91%")).toBe("0.91%");
    expect(scalarText(38.5)).toBe("38.5");
    expect(scalarText(false)).toBe("false");
    expect(scalarText(null)).toBe("null");
  });
});

describe("formatFactLines", () => {
  const data = {
    expense_ratio: "0.91%",
    top_holdings: ["Alder Bank Ltd 7.9%", "Corvid Power Ltd 6.2%"],
    ratios: { sharpe: 1.12, beta: 0.87 },
    lock_in: null,
  };

  it("renders scalars, lists and maps with indentation", () => {
    expect(formatFactLines(data, "  ")).toEqual([
      "  Expense Ratio: 0.91%",
      "  Top Holdings:",
      "    - Alder Bank Ltd 7.9%",
      "    - Corvid Power Ltd 6.2%",
      "  Ratios:",
      "    Sharpe: 1.12",
      "    Beta: 0.87",
      "  Lock In: null",
    ]);
  });

  it("puts the bullet only on top-level lines", () => {
    expect(formatFactLines({ expense_ratio: "0.91%", ratios: { beta: 0.87 } }, "", "- ")).toEqual([
      "- Expense Ratio: 0.91%",
      "- Ratios:",
      "  Beta: 0.87",
    ]);
  });

  it("inlines objects nested inside lists", () => {
    const lines = formatFactLines(
      { top_holdings: [{ name: "Alder Bank Ltd", weight: "7.9%" }] },
      "",
    );
    expect(lines).toEqual(["Top Holdings:", "  - Name: Alder Bank Ltd, Weight: 7.9%"]);
  });
});
