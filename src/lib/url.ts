import { isIP } from "node:net";

export type UrlParts = {
  scheme: string;
  netloc: string;
  path: string;
  query: string;
  fragment: string;
};

const schemePrefix = /^[a-zA-Z][a-zA-Z0-9+\-.]*:\/\//;
const allowedSchemes = new Set(["http", "https", "ftp"]);
const hostPattern = /^[A-Za-z0-9.-]+$/;

export function hasScheme(value: string): boolean {
  return schemePrefix.test(value);
}

export function isIpLiteral(host: string): boolean {
  return isIP(host) !== 0;
}

export function splitUrl(url: string): UrlParts {
  const match = schemePrefix.exec(url);
  const scheme = match ? match[0].slice(0, -3) : "";
  let rest = match ? url.slice(match[0].length) : url;

  let netloc = "";
  if (match || rest.startsWith("//")) {
    if (!match) rest = rest.slice(2);
    const end = rest.search(/[/?#]/);
    netloc = end === -1 ? rest : rest.slice(0, end);
    rest = end === -1 ? "" : rest.slice(end);
  }

  let fragment = "";
  const hashAt = rest.indexOf("#");
  if (hashAt !== -1) {
    fragment = rest.slice(hashAt + 1);
    rest = rest.slice(0, hashAt);
  }

  let query = "";
  const queryAt = rest.indexOf("?");
  if (queryAt !== -1) {
    query = rest.slice(queryAt + 1);
    rest = rest.slice(0, queryAt);
  }

  return { scheme, netloc, path: rest, query, fragment };
}

// Host portion of a netloc: userinfo and port dropped, IPv6 brackets removed.
export function hostnameOf(netloc: string): string {
  const hostPort = netloc.slice(netloc.lastIndexOf("@") + 1);
  if (hostPort.startsWith("[")) {
    const close = hostPort.indexOf("]");
    return close === -1 ? "" : hostPort.slice(1, close).toLowerCase();
  }
  if (hostPort.includes("]")) return "";
  const colon = hostPort.indexOf(":");
  return (colon === -1 ? hostPort : hostPort.slice(0, colon)).toLowerCase();
}

export function normalizeUrl(raw: string): string {
  const input = String(raw || "").trim().replace(/[\t\r\n]/g, "");
  if (!input) return "";

  const parts = splitUrl(hasScheme(input) ? input : `http://${input}`);
  const scheme = (parts.scheme || "http").toLowerCase();
  const lowered = parts.netloc.toLowerCase();
  const netloc = lowered.slice(lowered.lastIndexOf("@") + 1);
  const path = parts.path.replace(/\/+$/, "");
  const normalized = `${scheme}://${netloc}${path}${parts.query ? `?${parts.query}` : ""}`;

  // a dropped fragment or slash can expose trailing whitespace; normalize again until stable
  return normalized === normalized.trim() ? normalized : normalizeUrl(normalized);
}

export function domainOf(raw: string): string {
  try {
    return hostnameOf(splitUrl(normalizeUrl(raw)).netloc);
  } catch {
    return "";
  }
}

export function isValidUrl(raw: string): boolean {
  try {
    const normalized = normalizeUrl(raw);
    if (!normalized) return false;

    const parts = splitUrl(normalized);
    if (!allowedSchemes.has(parts.scheme)) return false;

    const host = hostnameOf(parts.netloc);
    if (!host) return false;
    if (isIpLiteral(host)) return true;

    if (!host.includes(".")) return false;
    const tld = host.slice(host.lastIndexOf(".") + 1);
    if (tld.length < 2 && !host.startsWith("xn--")) return false;

    return hostPattern.test(host);
  } catch {
    return false;
  }
}
