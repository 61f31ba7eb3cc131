/**
 * ETags for journal entries.
 *
 * A pending entry can be edited, so clients send back the ETag they
 * read in If-Match; an edit based on a stale copy is refused with 412.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Compute a strong ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const json = JSON.stringify(obj);
  const hash = createHash("sha256").update(json).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

function listed(header: string): readonly string[] {
  return header.split(",").map((tag) => tag.trim());
}

/**
 * Check the If-Match header against the entity's current ETag.
 * Returns a 412 response on mismatch, or undefined to continue.
 */
export function checkIfMatch(
  c: Context,
  entity: unknown,
): Response | undefined {
  const ifMatch = c.req.header("If-Match");
  if (ifMatch === undefined) {
    return undefined;
  }

  const currentETag = computeETag(entity);
  const tags = listed(ifMatch);
  if (!tags.includes("*") && !tags.includes(currentETag)) {
    return c.json(
      createErrorEnvelope(
        "PRECONDITION_FAILED",
        "If-Match header does not match current entity state",
        { currentETag },
      ),
      412,
    );
  }

  return undefined;
}

/**
 * True when If-None-Match names the entity's current ETag.
 */
export function isNotModified(c: Context, entity: unknown): boolean {
  const ifNoneMatch = c.req.header("If-None-Match");
  if (ifNoneMatch === undefined) {
    return false;
  }
  const tags = listed(ifNoneMatch);
  return tags.includes("*") || tags.includes(computeETag(entity));
}

/**
 * Set ETag header on the response for the given entity.
 */
export function setETag(c: Context, entity: unknown): void {
  c.header("ETag", computeETag(entity));
}
