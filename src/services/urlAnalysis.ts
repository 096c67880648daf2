import { env } from "../config/env";
import { domainOf, isValidUrl, normalizeUrl } from "../lib/url";
import { evaluateHeuristics } from "../risk/heuristics";
import { verdictRisk } from "../risk/rules";
import { type DnsStatus, resolveDomain } from "./dnsResolver";
import { listContains, recordDynamicBlacklist } from "./listStore";
import { type RegistrationStatus, checkRegistration } from "./whois";

export type Verdict =
  | "invalid"
  | "safe"
  | "blacklisted"
  | "dynamic"
  | "suspicious"
  | "nonexistent"
  | "unknown"
  | "unregistered"
  | "unknown_registration";

export type SuggestedList = "whitelist" | "blacklist";

export type VerdictResult = Readonly<{
  url: string;
  verdict: Verdict;
  risk: number; // 0..100
  notes: string;
  suggestAdd: SuggestedList | null;
}>;

export type PipelineOutcome = { ok: true; result: VerdictResult } | { ok: false; error: string };

export type AnalysisDeps = {
  whitelistFile: string;
  blacklistFile: string;
  dynamicBlacklistFile: string;
  resolve: (domain: string) => Promise<DnsStatus>;
  checkRegistration: (domain: string) => Promise<RegistrationStatus>;
};

export function defaultAnalysisDeps(): AnalysisDeps {
  return {
    whitelistFile: env.whitelistFile,
    blacklistFile: env.blacklistFile,
    dynamicBlacklistFile: env.dynamicBlacklistFile,
    resolve: (domain) => resolveDomain(domain),
    checkRegistration: (domain) => checkRegistration(domain, { timeoutMs: env.whoisTimeoutMs })
  };
}

function verdict(url: string, value: Verdict, risk: number, notes: string, suggestAdd: SuggestedList | null = null): VerdictResult {
  return Object.freeze({ url, verdict: value, risk, notes, suggestAdd });
}

// Advisory write: a failure here must never change the verdict returned to the caller.
async function flagDynamic(file: string, url: string) {
  try {
    await recordDynamicBlacklist(file, url);
  } catch (err) {
    console.warn("dynamic blacklist write skipped", {
      file,
      url,
      message: err instanceof Error ? err.message : String(err)
    });
  }
}

export async function analyzeUrl(raw: string, overrides: Partial<AnalysisDeps> = {}): Promise<VerdictResult> {
  const deps = { ...defaultAnalysisDeps(), ...overrides };
  const url = normalizeUrl(raw);

  if (!isValidUrl(url)) {
    return verdict(url, "invalid", verdictRisk.invalid, "Invalid URL format. Check the scheme and host name.");
  }

  const domain = domainOf(url);

  if (await listContains(deps.whitelistFile, url, domain)) {
    return verdict(url, "safe", verdictRisk.whitelisted, "Whitelisted: trusted website.");
  }

  if (await listContains(deps.blacklistFile, url, domain)) {
    return verdict(url, "blacklisted", verdictRisk.blacklisted, "Listed in blacklist: confirmed malicious.");
  }

  if (await listContains(deps.dynamicBlacklistFile, url, domain)) {
    return verdict(url, "dynamic", verdictRisk.dynamic, "Flagged earlier and listed in dynamic blacklist.");
  }

  const heuristics = evaluateHeuristics(url);
  if (heuristics.suspicious) {
    await flagDynamic(deps.dynamicBlacklistFile, url);
    return verdict(
      url,
      "suspicious",
      verdictRisk.suspicious,
      `Heuristic rules matched (${heuristics.riskFactors.join("; ")}). Added to dynamic blacklist; consider blocking.`,
      "blacklist"
    );
  }

  const dns = await deps.resolve(domain);
  if (dns === "NOT_EXISTS") {
    await flagDynamic(deps.dynamicBlacklistFile, url);
    return verdict(url, "nonexistent", verdictRisk.nonexistent, "Domain does not resolve. Added to dynamic blacklist.", "blacklist");
  }
  if (dns === "INDETERMINATE") {
    return verdict(url, "unknown", verdictRisk.dnsUnknown, "Could not verify domain (DNS/network issue).");
  }

  const registration = await deps.checkRegistration(domain);
  if (registration === "UNREGISTERED") {
    await flagDynamic(deps.dynamicBlacklistFile, url);
    return verdict(
      url,
      "unregistered",
      verdictRisk.unregistered,
      "WHOIS indicates the domain is not registered (available). Possibly malicious.",
      "blacklist"
    );
  }
  if (registration === "INDETERMINATE") {
    return verdict(
      url,
      "unknown_registration",
      verdictRisk.registrationUnknown,
      "DNS resolves but WHOIS lookup was inconclusive. Proceed with caution."
    );
  }

  return verdict(url, "safe", verdictRisk.registered, "Passed checks; domain resolves and appears registered.", "whitelist");
}

export async function runPipeline(raw: string, overrides: Partial<AnalysisDeps> = {}): Promise<PipelineOutcome> {
  try {
    return { ok: true, result: await analyzeUrl(raw, overrides) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error("url analysis failed", { url: raw, message });
    return { ok: false, error: message };
  }
}
