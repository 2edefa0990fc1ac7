import {
  DISSECTION_GROUP_IDS,
  type MetricKindTag,
} from "../../core/entities/metric";
import { normalizeText } from "../../shared/text/similarity";

type DissectionIndicator = {
  groupId: number;
  label: string;
  patterns: string[];
};

// Checked in order; quarterly growth precedes annual growth so "q/q growth" never reads as yearly.
const DISSECTION_INDICATORS: DissectionIndicator[] = [
  {
    groupId: DISSECTION_GROUP_IDS.quarterlyGrowth,
    label: "quarterly growth",
    patterns: ["quarterly growth", "qoq growth", "q/q growth", "quarter on quarter growth"],
  },
  {
    groupId: DISSECTION_GROUP_IDS.annualGrowth,
    label: "annual growth",
    patterns: [
      "annual growth",
      "yoy growth",
      "y/y growth",
      "year over year growth",
      "year on year growth",
    ],
  },
  {
    groupId: DISSECTION_GROUP_IDS.percentOfAssets,
    label: "% of assets",
    patterns: [
      "percentage of asset",
      "percent of asset",
      "% of asset",
      "of total asset",
      "of asset",
    ],
  },
  {
    groupId: DISSECTION_GROUP_IDS.percentOfSales,
    label: "% of sales",
    patterns: [
      "percentage of sales",
      "percentage of revenue",
      "percent of sales",
      "percent of revenue",
      "% of sales",
      "% of revenue",
      "of sales",
      "of revenue",
    ],
  },
  {
    groupId: DISSECTION_GROUP_IDS.perShare,
    label: "per share",
    patterns: ["per share", "/share"],
  },
];

const RATIO_INDICATORS = [
  "ratio",
  "margin",
  "return on",
  "roe",
  "roa",
  "roce",
  "yield",
  "coverage",
  "to equity",
  "debt to",
  "debt/equity",
];

/** Common phrasings rewritten to the wording head names use. */
const METRIC_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["d&a", "depreciation and amortisation"],
  ["d & a", "depreciation and amortisation"],
  ["amortization", "amortisation"],
  ["eps", "earnings per share"],
  ["pat", "profit after tax"],
  ["pbt", "profit before tax"],
  ["net income", "profit after tax"],
  ["roe", "return on equity"],
  ["roa", "return on assets"],
  ["bvps", "book value per share"],
];

/** Alias phrasings, longest first, for callers that spot metrics in free text. */
export const METRIC_ALIAS_PHRASES: readonly string[] = METRIC_ALIASES.map(
  ([alias]) => alias,
).sort((left, right) => right.length - left.length);

const DANGLING_WORDS = new Set(["as", "a", "the", "in", "of", "per", "and", "%"]);

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

// Acronyms must stand alone; longer terms may take a plural or other suffix.
const containsTerm = (text: string, term: string): boolean => {
  const start = /^[a-z0-9]/.test(term) ? "(^|[^a-z0-9])" : "";
  const end = term.length <= 4 ? "(?![a-z0-9])" : "";
  return new RegExp(`${start}${escapeRegExp(term)}${end}`).test(text);
};

const trimDangling = (text: string): string => {
  const words = text.split(" ").filter(Boolean);
  while (words.length > 0 && DANGLING_WORDS.has(words[0] ?? "")) {
    words.shift();
  }
  while (words.length > 0 && DANGLING_WORDS.has(words[words.length - 1] ?? "")) {
    words.pop();
  }
  return words.join(" ");
};

export type DetectedDissection = {
  groupId: number;
  label: string;
  /** Normalized indicator text as found in the phrase. */
  indicator: string;
};

export type MetricClassification = {
  /** Normalized, alias-expanded phrase used for head-name matching. */
  phrase: string;
  dissection: DetectedDissection | null;
  /** Alias-expanded phrase with the dissection indicator removed. */
  basePhrase: string | null;
  hasRatioIndicator: boolean;
  kindOrder: MetricKindTag[];
};

/**
 * Rewrites alias phrasings on word boundaries, the longest alias first.
 */
export const applyAliases = (phrase: string): string => {
  let result = ` ${normalizeText(phrase)} `;
  const ordered = [...METRIC_ALIASES].sort(
    (left, right) => right[0].length - left[0].length,
  );
  for (const [alias, replacement] of ordered) {
    const pattern = new RegExp(
      `(?<=[^a-z0-9])${escapeRegExp(alias)}(?=[^a-z0-9])`,
      "g",
    );
    result = result.replace(pattern, replacement);
  }
  return normalizeText(result);
};

export const detectDissection = (phrase: string): DetectedDissection | null => {
  const normalized = normalizeText(phrase);
  for (const indicator of DISSECTION_INDICATORS) {
    const match = indicator.patterns.find((pattern) =>
      containsTerm(normalized, pattern),
    );
    if (match) {
      return { groupId: indicator.groupId, label: indicator.label, indicator: match };
    }
  }
  return null;
};

export const hasRatioIndicator = (phrase: string): boolean => {
  const normalized = normalizeText(phrase);
  return RATIO_INDICATORS.some((indicator) => containsTerm(normalized, indicator));
};

/**
 * Kind precedence: a dissection indicator puts dissection first, then ratio, then regular;
 * a ratio indicator puts ratio before regular; otherwise regular leads.
 */
export const kindOrderFor = (
  dissection: DetectedDissection | null,
  ratio: boolean,
): MetricKindTag[] => {
  if (dissection) {
    return ["dissection", "ratio", "regular"];
  }
  return ratio ? ["ratio", "regular"] : ["regular", "ratio"];
};

/**
 * Reads indicators off the raw phrase, then expands aliases for matching.
 */
export const classifyMetricPhrase = (rawPhrase: string): MetricClassification => {
  const normalized = normalizeText(rawPhrase);
  const dissection = detectDissection(normalized);
  const ratio = hasRatioIndicator(normalized);

  let basePhrase: string | null = null;
  if (dissection) {
    const stripped = normalized.replace(
      new RegExp(`${escapeRegExp(dissection.indicator)}[a-z]*`),
      " ",
    );
    const base = trimDangling(normalizeText(stripped));
    basePhrase = base ? applyAliases(base) : null;
  }

  return {
    phrase: applyAliases(normalized),
    dissection,
    basePhrase,
    hasRatioIndicator: ratio,
    kindOrder: kindOrderFor(dissection, ratio),
  };
};
