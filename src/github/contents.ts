import { z } from "zod";
import type { Logger } from "../logger.js";

const ContentsPayloadSchema = z.object({
  content: z.string(),
  encoding: z.unknown().optional(),
});

/**
 * Decodes the body of `GET /repos/{owner}/{repo}/contents/{path}`.
 * Output that is not a file payload (directory listings, non-JSON) comes back raw.
 */
export function decodeContentsPayload(output: Buffer, label: string, log: Logger): Buffer {
  if (!output.length) {
    log.error(`File ${label} is empty.`);
    return Buffer.alloc(0);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(output.toString("utf8"));
  } catch {
    log.error(`Failed to decode JSON for ${label}.`);
    return output;
  }

  const parsed = ContentsPayloadSchema.safeParse(payload);
  if (!parsed.success) return output;

  const normalized = parsed.data.content.trim();
  if (parsed.data.encoding === "base64") {
    return Buffer.from(normalized, "base64");
  }
  return Buffer.from(normalized, "utf8");
}
