import nodemailer from "nodemailer";
import { ATTACHMENT_SIZE_HEADER, type MessageFields } from "@mailstash/shared";
import type { OutgoingAttachment } from "./types.js";

/**
 * Build the RFC 822 source of a part message: the subject, one
 * application/octet-stream attachment, and a header with the payload length.
 * Nodemailer's stream transport renders it without sending anything.
 */
export async function buildPartMessage(
  address: string,
  fields: MessageFields,
  attachment: OutgoingAttachment
): Promise<Buffer> {
  const mail = nodemailer.createTransport({
    streamTransport: true,
    buffer: true,
    newline: "windows",
  });

  const info = await mail.sendMail({
    from: address,
    to: address,
    subject: fields.subject,
    headers: { [ATTACHMENT_SIZE_HEADER]: String(attachment.content.length) },
    attachments: [
      {
        filename: attachment.filename,
        content: attachment.content,
        contentType: "application/octet-stream",
      },
    ],
  });

  if (!Buffer.isBuffer(info.message)) {
    throw new Error("nodemailer did not return a buffered message");
  }
  return info.message;
}
