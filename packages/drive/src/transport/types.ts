import type { MessageFields } from "@mailstash/shared";

export interface AttachmentInfo {
  /** Decoded payload length in bytes. */
  size: number;
}

export interface TransportMessage {
  /** Unique within its folder only (an IMAP UID). */
  id: string;
  fields: Partial<MessageFields>;
  /** Internal date of the message, when the server reports one. */
  date: Date | null;
  attachments: AttachmentInfo[];
}

export interface OutgoingAttachment {
  filename: string;
  content: Buffer;
}

/**
 * The mail service as the drive sees it: folders holding messages that carry
 * a subject and at most one attachment.
 */
export interface MailTransport {
  /** Throws FolderNotFoundError when the folder does not exist. */
  listMessages(folderId: string): Promise<TransportMessage[]>;
  fetchAttachment(folderId: string, messageId: string): Promise<Buffer>;
  /** Resolves once the server has accepted the message. Null when it reports no id. */
  sendMessage(
    folderId: string,
    fields: MessageFields,
    attachment: OutgoingAttachment
  ): Promise<string | null>;
  deleteMessage(folderId: string, messageId: string): Promise<void>;
  /** Idempotent; creates missing ancestors. */
  createFolder(folderId: string): Promise<void>;
  /** Every descendant of `parentFolderId`, or every folder when omitted. */
  listFolders(parentFolderId?: string): Promise<string[]>;
  close(): Promise<void>;
}
