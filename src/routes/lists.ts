import { type NextFunction, type Request, type Response, Router } from "express";
import { z } from "zod";
import { HttpError } from "../lib/httpError";
import { isValidUrl } from "../lib/url";
import { validate } from "../middleware/validate";
import { addToList, listFile, listNames, loadEntries } from "../services/listStore";

const router = Router();

const listNameSchema = z.enum(["whitelist", "blacklist", "dynamic"]);
const editableListSchema = z.enum(["whitelist", "blacklist"]);
const entrySchema = z.object({
  url: z.string().trim().min(1).max(2048)
});

router.get("/", (_req, res) => {
  res.json({ lists: listNames });
});

router.get("/:list", async (req, res, next) => {
  const parsed = listNameSchema.safeParse(req.params.list);
  if (!parsed.success) {
    next(new HttpError(404, `Unknown list: ${req.params.list}`));
    return;
  }

  const entries = Array.from(await loadEntries(listFile(parsed.data))).sort();
  res.json({ list: parsed.data, entries });
});

function requireEditableList(req: Request, _res: Response, next: NextFunction) {
  if (!editableListSchema.safeParse(req.params.list).success) {
    next(new HttpError(404, `List cannot be edited: ${req.params.list}`));
    return;
  }
  next();
}

router.post("/:list/entries", requireEditableList, validate(entrySchema), async (req, res, next) => {
  const url = String(req.body.url);
  if (!isValidUrl(url)) {
    next(new HttpError(400, `Invalid URL: ${url}`));
    return;
  }

  try {
    const list = editableListSchema.parse(req.params.list);
    const { entry, added } = await addToList(listFile(list), url);
    res.status(added ? 201 : 200).json({ list, entry, added });
  } catch (err) {
    next(err);
  }
});

export default router;
