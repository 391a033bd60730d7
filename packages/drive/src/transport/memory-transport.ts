import {
  FolderNotFoundError,
  NotFoundError,
  type MessageFields,
} from "@mailstash/shared";
import type { MailTransport, OutgoingAttachment, TransportMessage } from "./types.js";

interface StoredMessage {
  id: string;
  fields: MessageFields;
  date: Date;
  attachment: OutgoingAttachment;
}

interface Mailbox {
  nextUid: number;
  messages: Map<string, StoredMessage>;
}

export interface MemoryTransportOptions {
  folderSeparator?: string;
  /** Deleted messages are moved here instead of discarded. */
  trashFolder?: string;
}

/**
 * In-process mailbox with the same observable behaviour as ImapTransport.
 * Ids are per-folder counters, like IMAP UIDs.
 */
export class MemoryTransport implements MailTransport {
  private readonly separator: string;
  private readonly trashFolder: string | undefined;
  private readonly mailboxes = new Map<string, Mailbox>();

  constructor(options: MemoryTransportOptions = {}) {
    this.separator = options.folderSeparator ?? "/";
    this.trashFolder = options.trashFolder;
  }

  async listMessages(folderId: string): Promise<TransportMessage[]> {
    const mailbox = this.mailbox(folderId);
    return [...mailbox.messages.values()].map((msg) => ({
      id: msg.id,
      fields: { ...msg.fields },
      date: new Date(msg.date),
      attachments: [{ size: msg.attachment.content.length }],
    }));
  }

  async fetchAttachment(folderId: string, messageId: string): Promise<Buffer> {
    const msg = this.mailbox(folderId).messages.get(messageId);
    if (!msg) {
      throw new NotFoundError(`${folderId}#${messageId}`, `Message ${messageId} not found in "${folderId}"`);
    }
    return Buffer.from(msg.attachment.content);
  }

  async sendMessage(
    folderId: string,
    fields: MessageFields,
    attachment: OutgoingAttachment
  ): Promise<string> {
    return this.store(this.mailbox(folderId), {
      fields: { ...fields },
      date: new Date(),
      attachment: { filename: attachment.filename, content: Buffer.from(attachment.content) },
    });
  }

  async deleteMessage(folderId: string, messageId: string): Promise<void> {
    const mailbox = this.mailbox(folderId);
    const msg = mailbox.messages.get(messageId);
    if (!msg) {
      throw new NotFoundError(`${folderId}#${messageId}`, `Message ${messageId} not found in "${folderId}"`);
    }
    mailbox.messages.delete(messageId);

    if (this.trashFolder !== undefined && this.trashFolder !== folderId) {
      await this.createFolder(this.trashFolder);
      this.store(this.mailbox(this.trashFolder), msg);
    }
  }

  async createFolder(folderId: string): Promise<void> {
    const segments = folderId.split(this.separator);
    for (let i = 1; i <= segments.length; i++) {
      const id = segments.slice(0, i).join(this.separator);
      if (!this.mailboxes.has(id)) {
        this.mailboxes.set(id, { nextUid: 1, messages: new Map() });
      }
    }
  }

  async listFolders(parentFolderId?: string): Promise<string[]> {
    const ids = [...this.mailboxes.keys()];
    const matching =
      parentFolderId === undefined
        ? ids
        : ids.filter((id) => id.startsWith(parentFolderId + this.separator));
    return matching.sort();
  }

  async close(): Promise<void> {}

  private mailbox(folderId: string): Mailbox {
    const mailbox = this.mailboxes.get(folderId);
    if (!mailbox) throw new FolderNotFoundError(folderId);
    return mailbox;
  }

  private store(mailbox: Mailbox, msg: Omit<StoredMessage, "id">): string {
    const id = String(mailbox.nextUid++);
    mailbox.messages.set(id, { ...msg, id });
    return id;
  }
}
