import { describe, expect, it } from "vitest";
import {
  applyAliases,
  classifyMetricPhrase,
  detectDissection,
  hasRatioIndicator,
  kindOrderFor,
} from "./metricClassifier";

describe("applyAliases", () => {
  it("rewrites aliases on word boundaries only", () => {
    expect(applyAliases("D&A")).toBe("depreciation and amortisation");
    expect(applyAliases("PAT")).toBe("profit after tax");
    expect(applyAliases("patents")).toBe("patents");
    expect(applyAliases("Depreciation & Amortization")).toBe(
      "depreciation & amortisation",
    );
  });
});

describe("detectDissection", () => {
  it("reads growth indicators before ratio-of indicators", () => {
    expect(detectDissection("Net Sales YoY growth")).toEqual({
      groupId: 2,
      label: "annual growth",
      indicator: "yoy growth",
    });
    expect(detectDissection("deposits q/q growth")?.groupId).toBe(5);
  });

  it("detects ratio-of and per-share phrasing", () => {
    expect(detectDissection("total assets as % of sales")?.groupId).toBe(4);
    expect(detectDissection("deposits as percentage of assets")?.groupId).toBe(3);
    expect(detectDissection("profit after tax/share")?.groupId).toBe(1);
  });

  it("ignores phrases without an indicator", () => {
    expect(detectDissection("total assets")).toBeNull();
    expect(detectDissection("eps")).toBeNull();
  });
});

describe("hasRatioIndicator", () => {
  it("matches ratio vocabulary and stand-alone acronyms", () => {
    expect(hasRatioIndicator("Current Ratio")).toBe(true);
    expect(hasRatioIndicator("ROE")).toBe(true);
    expect(hasRatioIndicator("return on equity")).toBe(true);
    expect(hasRatioIndicator("Deposits")).toBe(false);
    expect(hasRatioIndicator("roes")).toBe(false);
  });
});

describe("kindOrderFor", () => {
  it("orders kinds by indicator", () => {
    expect(kindOrderFor({ groupId: 1, label: "per share", indicator: "per share" }, true)).toEqual([
      "dissection",
      "ratio",
      "regular",
    ]);
    expect(kindOrderFor(null, true)).toEqual(["ratio", "regular"]);
    expect(kindOrderFor(null, false)).toEqual(["regular", "ratio"]);
  });
});

describe("classifyMetricPhrase", () => {
  it("expands aliases after reading indicators from the raw phrase", () => {
    const classification = classifyMetricPhrase("EPS");

    expect(classification.phrase).toBe("earnings per share");
    expect(classification.dissection).toBeNull();
    expect(classification.kindOrder).toEqual(["regular", "ratio"]);
  });

  it("reads an acronym ratio as ratio first", () => {
    const classification = classifyMetricPhrase("ROE");

    expect(classification.phrase).toBe("return on equity");
    expect(classification.hasRatioIndicator).toBe(true);
    expect(classification.kindOrder).toEqual(["ratio", "regular"]);
  });

  it("strips the dissection indicator to find the base phrase", () => {
    expect(classifyMetricPhrase("PAT per share").basePhrase).toBe("profit after tax");
    expect(classifyMetricPhrase("total assets as % of sales").basePhrase).toBe(
      "total assets",
    );
    expect(classifyMetricPhrase("Net Sales YoY growth").basePhrase).toBe("net sales");
  });

  it("leaves the base phrase empty when only the indicator remains", () => {
    expect(classifyMetricPhrase("per share").basePhrase).toBeNull();
  });
});
