import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";
import { domainOf, hasScheme, normalizeUrl } from "../lib/url";

export type ListName = "whitelist" | "blacklist" | "dynamic";

export const listNames: readonly ListName[] = ["whitelist", "blacklist", "dynamic"];

export function listFile(name: ListName): string {
  if (name === "whitelist") return env.whitelistFile;
  if (name === "blacklist") return env.blacklistFile;
  return env.dynamicBlacklistFile;
}

function entriesForLine(line: string): string[] {
  const lowered = line.toLowerCase();
  if (!hasScheme(lowered) && !lowered.includes("/")) return [lowered];

  const normalized = normalizeUrl(lowered);
  const host = domainOf(normalized);
  return host ? [normalized, host] : [normalized];
}

// URL lines contribute both their normalized form and their host, so URL and bare-domain entries match either way.
export async function loadEntries(file: string): Promise<Set<string>> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch {
    return new Set();
  }

  const entries = new Set<string>();
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    for (const entry of entriesForLine(line)) entries.add(entry);
  }
  return entries;
}

export async function listContains(file: string, normalizedUrl: string, domain: string): Promise<boolean> {
  const entries = await loadEntries(file);
  return (Boolean(domain) && entries.has(domain)) || entries.has(normalizedUrl.toLowerCase());
}

// Read-then-write without a lock: concurrent appends to one file may still duplicate a line.
export async function appendEntry(file: string, entry: string): Promise<boolean> {
  const value = entry.trim().toLowerCase();
  if (!value) return false;

  const existing = await loadEntries(file);
  if (existing.has(value)) return false;

  await mkdir(path.dirname(file), { recursive: true });
  const current = await readFile(file, "utf8").catch(() => "");
  const separator = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
  await appendFile(file, `${separator}${value}\n`, "utf8");
  return true;
}

function preferredEntry(url: string): string {
  return domainOf(url) || url.toLowerCase();
}

export async function recordDynamicBlacklist(file: string, url: string): Promise<boolean> {
  return appendEntry(file, preferredEntry(url));
}

export async function addToList(file: string, url: string): Promise<{ entry: string; added: boolean }> {
  const entry = preferredEntry(url).trim();
  const added = await appendEntry(file, entry);
  return { entry: entry.toLowerCase(), added };
}
