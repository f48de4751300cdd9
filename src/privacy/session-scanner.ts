import { fullScan } from "../detector/scanner.js";
import type { FullScanOptions } from "../detector/scanner.js";
import type { PrivacyTagRepository } from "../db/repositories/privacy-tag-repository.js";
import type { PrivacyTag, SessionId } from "../types.js";

/**
 * Tags a session's transcript the first time it is seen. A session that already
 * has tags keeps them exactly as they are, including their review status.
 */
export function scanSession(
  tags: PrivacyTagRepository,
  sessionId: SessionId,
  text: string,
  options: FullScanOptions = {},
): { tags: PrivacyTag[]; created: boolean } {
  const existing = tags.listBySession(sessionId);
  if (existing.length > 0 || text.length === 0) {
    return { tags: existing, created: false };
  }

  return tags.createForSession(sessionId, fullScan(text, options));
}
