import { z } from "zod";
import { normalizeWhitespace } from "../lib/scoring";

export const MAX_LIST_ITEMS = 100;

/** Non-blank string, whitespace-collapsed before any handler sees it. */
export const requiredText = z.string().trim().min(1, "must not be empty").transform(normalizeWhitespace);

/** Optional string; blank input is treated as absent. */
export const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const normalized = value === undefined ? "" : normalizeWhitespace(value);
    return normalized.length > 0 ? normalized : undefined;
  });

export const textList = z.array(requiredText).max(MAX_LIST_ITEMS, `must have at most ${MAX_LIST_ITEMS} items`);
