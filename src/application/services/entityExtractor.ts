import type {
  ExtractedEntities,
  Fragment,
  FragmentName,
} from "../../core/entities/resolution";
import {
  containsPhrase,
  normalizeText,
  rankBySimilarity,
} from "../../shared/text/similarity";
import type { MetadataSnapshot } from "./metadataSnapshot";
import {
  METRIC_ALIAS_PHRASES,
  detectDissection,
  hasRatioIndicator,
} from "./metricClassifier";

type PeriodPattern = {
  pattern: RegExp;
  relative: boolean;
  confidence: number;
};

// Most specific shapes first; a bare year is the last resort.
const PERIOD_PATTERNS: PeriodPattern[] = [
  { pattern: /\b\d{4}-\d{1,2}-\d{1,2}\b/, relative: false, confidence: 1 },
  { pattern: /\b\d{1,2}[-/]\d{1,2}[-/]\d{4}\b/, relative: false, confidence: 1 },
  { pattern: /\bq[1-4]\s*(?:fy\s*)?'?(?:\d{4}|\d{2})\b/, relative: false, confidence: 1 },
  {
    pattern: /\b(?:first|second|third|fourth|1st|2nd|3rd|4th) quarter (?:of )?(?:fy\s*)?\d{4}\b/,
    relative: false,
    confidence: 1,
  },
  {
    pattern: /\b(?:3|6|9|12)\s*(?:m|months?)\s*(?:ended\s*)?(?:fy\s*)?\d{4}\b/,
    relative: false,
    confidence: 1,
  },
  { pattern: /\bh1\s*(?:fy\s*)?\d{4}\b/, relative: false, confidence: 1 },
  { pattern: /\b(?:fy|fiscal year|financial year)\s*'?(?:\d{4}|\d{2})\b/, relative: false, confidence: 1 },
  {
    pattern: /\b(?:current|this|last|previous|prior) (?:fiscal year|fy)\b/,
    relative: false,
    confidence: 0.9,
  },
  {
    pattern: /\b(?:most recent|last|latest|recent) quarter\b/,
    relative: true,
    confidence: 0.9,
  },
  {
    pattern: /\b(?:ytd|year to date|ttm|ltm|trailing (?:twelve|12) months|last (?:twelve|12) months)\b/,
    relative: true,
    confidence: 0.9,
  },
  {
    pattern: /\b(?:latest available|latest|most recent|last reported)\b/,
    relative: true,
    confidence: 0.9,
  },
  { pattern: /\b(?:19|20)\d{2}\b/, relative: false, confidence: 0.7 },
];

const CONSOLIDATION_PATTERN = /\(?\b(unconsolidated|standalone|stand-alone|consolidated)\b\)?/;

const QUESTION_LEAD =
  /^(?:what(?:'s| is| was| were| are)?|show(?: me)?|get|give me|tell me|find)\s+(?:the\s+)?(.+?)\s+(?:of|for)\b/;

const STOPWORDS = new Set([
  "what",
  "was",
  "is",
  "were",
  "are",
  "the",
  "of",
  "for",
  "in",
  "show",
  "me",
  "get",
  "give",
  "tell",
  "find",
  "a",
  "an",
  "s",
  "and",
]);

const FOLLOWING_WORDS = 5;

const stripStopwords = (text: string): string =>
  normalizeText(text)
    .split(" ")
    .filter((word) => word && !STOPWORDS.has(word))
    .join(" ");

const removeOnce = (text: string, phrase: string): string => {
  const index = text.indexOf(phrase);
  return index < 0 ? text : `${text.slice(0, index)} ${text.slice(index + phrase.length)}`;
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

const removeWords = (text: string, phrase: string): string =>
  text.replace(
    new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?=$|[^a-z0-9])`),
    "$1 ",
  );

const fragment = (text: string, confidence: number): Fragment => ({
  text: text.trim(),
  confidence: Number(confidence.toFixed(3)),
});

export type EntityExtractorOptions = {
  confidenceThreshold: number;
};

/**
 * Splits a free-text question into company, metric, period and consolidation fragments.
 */
export class EntityExtractor {
  constructor(private readonly options: EntityExtractorOptions) {}

  extract(query: string, snapshot: MetadataSnapshot): ExtractedEntities {
    let working = query.toLowerCase().replace(/[’`]/g, "'");

    const period = this.extractPeriod(working);
    if (period) {
      working = removeOnce(working, period.fragment.text);
    }

    const consolidationMatch = CONSOLIDATION_PATTERN.exec(working);
    const consolidation = consolidationMatch
      ? fragment(
          consolidationMatch[1] === "consolidated" ? "Consolidated" : "Unconsolidated",
          1,
        )
      : null;
    if (consolidationMatch) {
      working = removeOnce(working, consolidationMatch[0]);
    }

    const company = this.extractCompany(working, snapshot);
    if (company) {
      working = removeWords(working.replace(/'s\b/g, " "), company.text);
    }

    const metric = this.extractMetric(working, snapshot);
    const dissection = detectDissection(query);

    const lowConfidence: FragmentName[] = [];
    if (!company || company.confidence < this.options.confidenceThreshold) {
      lowConfidence.push("company");
    }
    if (!metric || metric.confidence < this.options.confidenceThreshold) {
      lowConfidence.push("metric");
    }

    return {
      query,
      company,
      metric,
      period: period?.fragment ?? null,
      consolidation,
      hasRelativePeriod: period?.relative ?? false,
      hasRatioIndicator: hasRatioIndicator(metric?.text ?? query),
      hasDissectionIndicator: dissection !== null,
      dissectionGroup: dissection
        ? { id: dissection.groupId, label: dissection.label }
        : undefined,
      lowConfidence,
    };
  }

  private extractPeriod(
    text: string,
  ): { fragment: Fragment; relative: boolean } | null {
    for (const { pattern, relative, confidence } of PERIOD_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        return { fragment: fragment(match[0], confidence), relative };
      }
    }
    return null;
  }

  private extractCompany(text: string, snapshot: MetadataSnapshot): Fragment | null {
    const byName = snapshot.companies
      .filter((company) => containsPhrase(text, company.name))
      .sort((left, right) => right.name.length - left.name.length)[0];
    if (byName) {
      return fragment(byName.name, 1);
    }

    const tokens = text.split(/[^a-z0-9.&]+/).filter(Boolean);
    const byTicker = tokens
      .filter((token) => !STOPWORDS.has(token))
      .map((token) => snapshot.companyByTicker(token))
      .find((company) => company !== undefined);
    if (byTicker) {
      return fragment(byTicker.ticker, 1);
    }

    const phrases = this.companyPhrases(text);
    let best: Fragment | null = null;
    for (const phrase of phrases) {
      const [top] = rankBySimilarity(phrase, snapshot.companies, (company) => [
        company.name,
        company.ticker,
      ]);
      if (
        top &&
        (!best ||
          top.score > best.confidence ||
          (top.score === best.confidence && phrase.length > best.text.length))
      ) {
        best = fragment(phrase, top.score);
      }
    }
    return best;
  }

  /**
   * Word windows after "for"/"of" plus possessive subjects.
   */
  private companyPhrases(text: string): string[] {
    const phrases = new Set<string>();

    for (const match of text.matchAll(/([a-z0-9&.\- ]+?)'s\b/g)) {
      const words = stripStopwords(match[1] ?? "").split(" ").filter(Boolean);
      for (let size = 1; size <= Math.min(words.length, FOLLOWING_WORDS); size += 1) {
        phrases.add(words.slice(words.length - size).join(" "));
      }
    }

    const words = normalizeText(text).split(" ");
    words.forEach((word, index) => {
      if (word !== "for" && word !== "of") {
        return;
      }
      const following = words
        .slice(index + 1, index + 1 + FOLLOWING_WORDS)
        .filter((candidate) => !STOPWORDS.has(candidate));
      for (let size = 1; size <= following.length; size += 1) {
        phrases.add(following.slice(0, size).join(" "));
      }
    });

    return Array.from(phrases).filter(Boolean);
  }

  private extractMetric(text: string, snapshot: MetadataSnapshot): Fragment | null {
    const base = this.extractBaseMetric(text, snapshot);
    if (!base) {
      return null;
    }

    const dissection = detectDissection(text);
    if (dissection && !containsPhrase(base.text, dissection.indicator)) {
      return fragment(`${base.text} ${dissection.label}`, base.confidence);
    }
    return base;
  }

  private extractBaseMetric(text: string, snapshot: MetadataSnapshot): Fragment | null {
    const heads = [...snapshot.regularHeads, ...snapshot.ratioHeads];
    const longest = heads
      .filter((head) => containsPhrase(text, head.name))
      .sort((left, right) => right.name.length - left.name.length)[0];
    if (longest) {
      return fragment(longest.name, 0.95);
    }

    const alias = METRIC_ALIAS_PHRASES.find((keyword) => containsPhrase(text, keyword));
    if (alias) {
      return fragment(alias, 0.8);
    }

    const lead = QUESTION_LEAD.exec(normalizeText(text));
    const phrase = lead?.[1] ? stripStopwords(lead[1]) : "";
    return phrase ? fragment(phrase, 0.5) : null;
  }
}
