export const suspiciousKeywords = ["scam", "phish", "login", "verify", "bank", "update"] as const;

export const maxUrlLength = 75;

export const verdictRisk = {
  invalid: 80,
  whitelisted: 0,
  blacklisted: 100,
  dynamic: 95,
  suspicious: 90,
  nonexistent: 85,
  dnsUnknown: 10,
  unregistered: 90,
  registrationUnknown: 15,
  registered: 5
} as const;
