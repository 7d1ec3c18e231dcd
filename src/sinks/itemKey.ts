import { createHash } from "crypto";
import type { ActionItem } from "../types.js";

/** Stable per-transcript key for an action item, from its normalised description. */
export function actionItemKey(item: ActionItem): string {
  const normalised = item.description.trim().replace(/\s+/g, " ").toLowerCase();
  return "item:" + createHash("sha1").update(normalised).digest("hex").slice(0, 16);
}
