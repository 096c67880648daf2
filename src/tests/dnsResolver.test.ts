import test from "node:test";
import assert from "node:assert/strict";
import { classifyLookupError, resolveDomain } from "../services/dnsResolver";

function lookupError(code: string, hostname: string) {
  return Object.assign(new Error(`getaddrinfo ${code} ${hostname}`), { code });
}

test("empty domain does not exist and skips the lookup", async () => {
  let calls = 0;
  const status = await resolveDomain("", async () => {
    calls += 1;
  });
  assert.equal(status, "NOT_EXISTS");
  assert.equal(calls, 0);
});

test("IP literals exist without a lookup", async () => {
  let calls = 0;
  const lookupFn = async () => {
    calls += 1;
  };
  assert.equal(await resolveDomain("192.168.1.1", lookupFn), "EXISTS");
  assert.equal(await resolveDomain("2001:db8::1", lookupFn), "EXISTS");
  assert.equal(calls, 0);
});

test("successful lookup means the domain exists", async () => {
  const looked: string[] = [];
  const status = await resolveDomain("example.com", async (hostname) => {
    looked.push(hostname);
    return { address: "192.0.2.10", family: 4 };
  });
  assert.equal(status, "EXISTS");
  assert.deepEqual(looked, ["example.com"]);
});

test("NXDOMAIN-style failures mean the domain does not exist", async () => {
  const status = await resolveDomain("no-such-host.example.net", async (hostname) => {
    throw lookupError("ENOTFOUND", hostname);
  });
  assert.equal(status, "NOT_EXISTS");
  assert.equal(classifyLookupError(new Error("[Errno -2] Name or service not known")), "NOT_EXISTS");
  assert.equal(classifyLookupError("No address associated with hostname"), "NOT_EXISTS");
});

test("temporary and unrecognised failures are indeterminate", async () => {
  const status = await resolveDomain("example.com", async (hostname) => {
    throw lookupError("EAI_AGAIN", hostname);
  });
  assert.equal(status, "INDETERMINATE");
  assert.equal(classifyLookupError(new Error("Temporary failure in name resolution")), "INDETERMINATE");
  assert.equal(classifyLookupError(new Error("query timed out")), "INDETERMINATE");
  assert.equal(classifyLookupError(new Error("socket hang up")), "INDETERMINATE");
});

test("error codes decide the status even when the hostname looks like a marker", async () => {
  const status = await resolveDomain("enotfound.example.com", async (hostname) => {
    throw lookupError("EAI_AGAIN", hostname);
  });
  assert.equal(status, "INDETERMINATE");
  assert.equal(classifyLookupError(lookupError("ETIMEOUT", "name-or-service-not-known.example.org")), "INDETERMINATE");
  assert.equal(classifyLookupError(lookupError("EAI_NODATA", "example.org")), "NOT_EXISTS");
  assert.equal(classifyLookupError(lookupError("ESERVFAIL", "example.org")), "INDETERMINATE");
});
