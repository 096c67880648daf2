import { Router } from "express";
import { z } from "zod";
import { HttpError } from "../lib/httpError";
import { validate } from "../middleware/validate";
import { runPipeline } from "../services/urlAnalysis";

const router = Router();

const urlCheckSchema = z.object({
  url: z.string().trim().min(1).max(2048)
});

router.post("/check", validate(urlCheckSchema), async (req, res, next) => {
  const { url } = req.body;
  const outcome = await runPipeline(String(url));
  if (!outcome.ok) {
    next(new HttpError(500, `URL analysis failed: ${outcome.error}`));
    return;
  }

  res.json(outcome.result);
});

export default router;
