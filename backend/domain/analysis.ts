export const VERDICTS = ["REAL", "FAKE", "PROPAGANDA", "SUSPICIOUS"] as const;

export type Verdict = (typeof VERDICTS)[number];

export const ANALYSIS_LANGUAGES = ["english", "urdu_hindi"] as const;

export type AnalysisLanguage = (typeof ANALYSIS_LANGUAGES)[number];

export const DEFAULT_ANALYSIS_LANGUAGE: AnalysisLanguage = "english";

export const DEFAULT_CONFIDENCE = 50;

export const SENTIMENTS = ["POSITIVE", "NEGATIVE", "NEUTRAL"] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export interface AnalysisResult {
  verdict: Verdict;
  confidence: number;
  details: string;
  language: AnalysisLanguage;
  timestamp: string;
  agentVersion: string;
  sessionId: string;
}

export interface PublicSentiment {
  sentiment: Sentiment;
  postCount: number;
  samplePosts: string[];
}

export interface FactCheckResult {
  claim: string;
  verdict: Verdict;
  confidence: number;
  analysis: string;
}

export interface ContentSentiment {
  sentiment: Sentiment;
}

export function resolveAnalysisLanguage(raw: string | null | undefined): AnalysisLanguage {
  const normalized = raw?.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (!normalized) {
    return DEFAULT_ANALYSIS_LANGUAGE;
  }

  return ANALYSIS_LANGUAGES.find((language) => language === normalized) ?? DEFAULT_ANALYSIS_LANGUAGE;
}

// Checked in this order; the first class with a hit wins.
const VERDICT_KEYWORDS: ReadonlyArray<readonly [Verdict, readonly string[]]> = [
  ["FAKE", ["fake", "false", "misinformation", "untrue", "jhoot", "galat", "incorrect"]],
  ["PROPAGANDA", ["propaganda", "biased", "agenda", "misleading", "partial", "manipulated"]],
  ["REAL", ["real", "true", "verified", "credible", "sach", "authentic", "accurate"]],
];

export function extractVerdict(text: string): Verdict {
  const labelled = /verdict\W{0,10}(real|fake|propaganda|suspicious)\b/i.exec(text);
  if (labelled) {
    return toVerdict(labelled[1].toUpperCase());
  }

  const words = new Set(text.toLowerCase().match(/[a-z]+/g) ?? []);
  for (const [verdict, keywords] of VERDICT_KEYWORDS) {
    if (keywords.some((keyword) => words.has(keyword))) {
      return verdict;
    }
  }

  return "SUSPICIOUS";
}

export function extractConfidence(text: string): number {
  const match = /confidence(?:\s+(?:score|level))?(?:\s*\(\s*0\s*-\s*100\s*\))?[\s:*=-]*(\d{1,3})/i.exec(
    text,
  );
  if (!match) {
    return DEFAULT_CONFIDENCE;
  }

  const parsed = Number.parseInt(match[1], 10);
  return Math.max(0, Math.min(100, parsed));
}

export function extractSentiment(text: string): Sentiment {
  const normalized = text.trim().toUpperCase();
  if (normalized.includes("POSITIVE")) {
    return "POSITIVE";
  }

  if (normalized.includes("NEGATIVE")) {
    return "NEGATIVE";
  }

  return "NEUTRAL";
}

function toVerdict(label: string): Verdict {
  return VERDICTS.find((verdict) => verdict === label) ?? "SUSPICIOUS";
}
