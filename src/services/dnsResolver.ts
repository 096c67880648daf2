import { lookup } from "node:dns/promises";
import { isIpLiteral } from "../lib/url";

export type DnsStatus = "EXISTS" | "NOT_EXISTS" | "INDETERMINATE";

export type LookupFn = (hostname: string) => Promise<unknown>;

const notFoundMarkers = [
  "enotfound",
  "name or service not known",
  "nodename nor servname provided",
  "no address associated",
  "eai_noname",
  "eai_nodata"
];

const temporaryMarkers = ["eai_again", "temporary failure", "try again", "timed out", "etimeout"];

const notFoundCodes = new Set(["ENOTFOUND", "EAI_NONAME", "EAI_NODATA"]);

function errorCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code.toUpperCase();
  return null;
}

// A resolver error code is authoritative; its message carries the hostname and is only read when no code exists.
export function classifyLookupError(err: unknown): DnsStatus {
  const code = errorCode(err);
  if (code) return notFoundCodes.has(code) ? "NOT_EXISTS" : "INDETERMINATE";

  const text = (err instanceof Error ? err.message : String(err)).toLowerCase();
  if (notFoundMarkers.some((marker) => text.includes(marker))) return "NOT_EXISTS";
  if (temporaryMarkers.some((marker) => text.includes(marker))) return "INDETERMINATE";
  return "INDETERMINATE";
}

// No timeout here; a slow resolver is bounded only by the system's own limits.
export async function resolveDomain(domain: string, lookupFn: LookupFn = lookup): Promise<DnsStatus> {
  if (!domain) return "NOT_EXISTS";
  if (isIpLiteral(domain)) return "EXISTS";

  try {
    await lookupFn(domain);
    return "EXISTS";
  } catch (err) {
    return classifyLookupError(err);
  }
}
