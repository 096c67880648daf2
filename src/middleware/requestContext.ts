import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";

const inboundIdPattern = /^[A-Za-z0-9_-]{8,64}$/;

export function attachRequestContext(req: Request, res: Response, next: NextFunction) {
  const inbound = req.get("x-request-id");
  const requestId = inbound && inboundIdPattern.test(inbound) ? inbound : crypto.randomUUID();
  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}
