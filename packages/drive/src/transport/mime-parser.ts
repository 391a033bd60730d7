import { simpleParser } from "mailparser";
import { ATTACHMENT_SIZE_HEADER } from "@mailstash/shared";

export interface ParsedPartMessage {
  subject: string | undefined;
  /** First attachment, or null when the message carries none. */
  attachment: Buffer | null;
  /** Value of the size header, when present and numeric. */
  declaredSize: number | null;
}

/**
 * Parse the raw source of a part message.
 */
export async function parsePartMessage(raw: Buffer): Promise<ParsedPartMessage> {
  const parsed = await simpleParser(raw);

  const sizeHeader = parsed.headers.get(ATTACHMENT_SIZE_HEADER.toLowerCase());
  const declaredSize =
    typeof sizeHeader === "string" && /^\d+$/.test(sizeHeader.trim())
      ? Number(sizeHeader.trim())
      : null;

  const first = parsed.attachments[0];
  return {
    subject: parsed.subject,
    attachment: first ? first.content : null,
    declaredSize,
  };
}

/** Read the size header out of a raw header block, as returned by a headers-only fetch. */
export function declaredSizeFromHeaders(headers: Buffer | string): number | null {
  const text = typeof headers === "string" ? headers : headers.toString("latin1");
  const match = text.match(new RegExp(`^${ATTACHMENT_SIZE_HEADER}:[ \\t]*(\\d+)[ \\t\\r]*$`, "im"));
  return match ? Number(match[1]) : null;
}
