import { maxUrlLength, suspiciousKeywords } from "./rules";

export type HeuristicResult = {
  suspicious: boolean;
  riskFactors: string[];
};

export function evaluateHeuristics(url: string): HeuristicResult {
  const riskFactors: string[] = [];
  const lowered = url.toLowerCase();

  const keywords = suspiciousKeywords.filter((keyword) => lowered.includes(keyword));
  if (keywords.length > 0) {
    riskFactors.push(`Contains lure keyword(s): ${keywords.join(", ")}`);
  }

  if (url.length > maxUrlLength) {
    riskFactors.push(`URL longer than ${maxUrlLength} characters`);
  }

  if (url.includes("@")) {
    riskFactors.push("Contains '@', which can hide the real destination");
  }

  if (url.split("//").length - 1 > 1) {
    riskFactors.push("Contains an extra '//' after the scheme");
  }

  return { suspicious: riskFactors.length > 0, riskFactors };
}

export function isSuspicious(url: string): boolean {
  return evaluateHeuristics(url).suspicious;
}
