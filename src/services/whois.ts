import net from "node:net";
import whoisServers from "../data/whoisServers.json";
import { isIpLiteral } from "../lib/url";

export type RegistrationStatus = "REGISTERED" | "UNREGISTERED" | "INDETERMINATE";

export type WhoisQueryFn = (server: string, domain: string, timeoutMs: number) => Promise<string>;

const whoisPort = 43;
const defaultTimeoutMs = 6_000;
const tldServers: Record<string, string> = whoisServers;
const fallbackServers = ["whois.iana.org", "whois.crsnic.net", "whois.verisign-grs.com"];

const notFoundMarkers = [
  "no match for",
  "not found",
  "no data found",
  "no entries found",
  "status: available",
  "domain not found",
  "no such domain",
  "available"
];

const registeredMarkers = [
  "domain name:",
  "registrar:",
  "creation date",
  "registered on",
  "registry expiry date",
  "expiry date",
  "updated date",
  "registration date"
];

export function whoisCandidates(domain: string): string[] {
  const tld = domain.includes(".") ? domain.slice(domain.lastIndexOf(".") + 1).toLowerCase() : "";
  const servers = tld && Object.hasOwn(tldServers, tld) ? [tldServers[tld], ...fallbackServers] : fallbackServers;
  return Array.from(new Set(servers));
}

// Not-found markers take precedence over registered markers.
export function classifyWhoisResponse(text: string): Exclude<RegistrationStatus, "INDETERMINATE"> | null {
  const lowered = text.toLowerCase();
  if (notFoundMarkers.some((marker) => lowered.includes(marker))) return "UNREGISTERED";
  if (registeredMarkers.some((marker) => lowered.includes(marker))) return "REGISTERED";
  return null;
}

export function queryWhoisServer(
  host: string,
  domain: string,
  options: { port?: number; timeoutMs?: number } = {}
): Promise<string> {
  const port = options.port ?? whoisPort;
  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ host, port, timeout: timeoutMs });

    socket.on("connect", () => {
      socket.write(`${domain}\r\n`);
    });
    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    socket.on("timeout", () => {
      socket.destroy(new Error(`WHOIS query to ${host} timed out after ${timeoutMs}ms`));
    });
    socket.on("error", reject);
    socket.on("close", (hadError) => {
      if (hadError) return;
      const text = Buffer.concat(chunks).toString("utf8").replace(/\uFFFD/g, "");
      resolve(text.toLowerCase());
    });
  });
}

const socketQuery: WhoisQueryFn = (server, domain, timeoutMs) => queryWhoisServer(server, domain, { timeoutMs });

// Worst case is timeoutMs per candidate server, tried one after another.
export async function checkRegistration(
  domain: string,
  options: { timeoutMs?: number; query?: WhoisQueryFn } = {}
): Promise<RegistrationStatus> {
  if (!domain) return "INDETERMINATE";
  if (isIpLiteral(domain)) return "REGISTERED";

  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
  const query = options.query ?? socketQuery;

  for (const server of whoisCandidates(domain)) {
    try {
      const status = classifyWhoisResponse(await query(server, domain, timeoutMs));
      if (status) return status;
    } catch (err) {
      console.warn("whois query failed", {
        server,
        domain,
        message: err instanceof Error ? err.message : String(err)
      });
    }
  }

  return "INDETERMINATE";
}
