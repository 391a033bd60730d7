import { ImapFlow } from "imapflow";
import {
  DriveError,
  FolderNotFoundError,
  MalformedPartError,
  NotFoundError,
  TransportError,
  messageOf,
  ATTACHMENT_SIZE_HEADER,
  type Credentials,
  type MessageFields,
} from "@mailstash/shared";
import type { Logger } from "../logger.js";
import { buildPartMessage } from "./message-builder.js";
import { declaredSizeFromHeaders, parsePartMessage } from "./mime-parser.js";
import type {
  AttachmentInfo,
  MailTransport,
  OutgoingAttachment,
  TransportMessage,
} from "./types.js";

export interface ImapTransportOptions {
  credentials: Required<Credentials>;
  folderSeparator: string;
  timeoutMs: number;
  /** Deleted messages are moved here instead of expunged. */
  trashFolder?: string;
  logger: Logger;
}

/** Subset of imapflow's body structure that size estimation reads. */
interface StructureNode {
  disposition?: string;
  encoding?: string;
  size?: number;
  childNodes?: StructureNode[];
}

/**
 * MailTransport over IMAP. One connection per instance, opened by
 * `ImapTransport.connect` and released by `close`.
 */
export class ImapTransport implements MailTransport {
  private readonly client: ImapFlow;
  private readonly options: ImapTransportOptions;

  private constructor(client: ImapFlow, options: ImapTransportOptions) {
    this.client = client;
    this.options = options;
  }

  /** Connect and authenticate. */
  static async connect(options: ImapTransportOptions): Promise<ImapTransport> {
    const { credentials } = options;
    const client = new ImapFlow({
      host: credentials.host,
      port: credentials.port,
      secure: true,
      auth: {
        user: credentials.address,
        pass: credentials.password,
      },
      logger: false,
    });

    const transport = new ImapTransport(client, options);
    await transport.run("connect", () => client.connect());
    await options.logger.debug(`Connected to ${credentials.host}:${credentials.port} as ${credentials.address}`);
    return transport;
  }

  /** Disconnect gracefully. */
  async close(): Promise<void> {
    await this.run("logout", () => this.client.logout());
  }

  async listMessages(folderId: string): Promise<TransportMessage[]> {
    return this.run("list messages", async () => {
      const lock = await this.lockFolder(folderId);
      try {
        const uids = await this.client.search({ all: true }, { uid: true });
        if (!uids || uids.length === 0) return [];

        const messages: TransportMessage[] = [];
        for await (const msg of this.client.fetch(
          uids,
          {
            uid: true,
            envelope: true,
            internalDate: true,
            bodyStructure: true,
            headers: [ATTACHMENT_SIZE_HEADER],
          },
          { uid: true }
        )) {
          const declared = msg.headers ? declaredSizeFromHeaders(msg.headers) : null;
          messages.push({
            id: String(msg.uid),
            fields: msg.envelope?.subject !== undefined ? { subject: msg.envelope.subject } : {},
            date: msg.internalDate ? new Date(msg.internalDate) : null,
            attachments:
              declared !== null ? [{ size: declared }] : attachmentsOf(msg.bodyStructure),
          });
        }
        return messages;
      } finally {
        lock.release();
      }
    });
  }

  async fetchAttachment(folderId: string, messageId: string): Promise<Buffer> {
    return this.run("fetch attachment", async () => {
      let source: Buffer | undefined;
      const lock = await this.lockFolder(folderId);
      try {
        const msg = await this.client.fetchOne(messageId, { source: true }, { uid: true });
        source = msg ? msg.source : undefined;
      } finally {
        lock.release();
      }

      if (!source) {
        throw new NotFoundError(`${folderId}#${messageId}`, `Message ${messageId} not found in "${folderId}"`);
      }

      const parsed = await parsePartMessage(source);
      if (parsed.attachment) return parsed.attachment;
      // Empty payloads may come back without an attachment part.
      if (parsed.declaredSize === 0) return Buffer.alloc(0);
      throw new MalformedPartError(parsed.subject ?? "", "message has no attachment");
    });
  }

  async sendMessage(
    folderId: string,
    fields: MessageFields,
    attachment: OutgoingAttachment
  ): Promise<string | null> {
    const raw = await buildPartMessage(this.options.credentials.address, fields, attachment);
    return this.run("append message", async () => {
      const result = await this.client.append(folderId, raw, ["\\Seen"]);
      if (!result) {
        throw new TransportError("append message", `server rejected the message for "${folderId}"`);
      }
      return result.uid !== undefined ? String(result.uid) : null;
    });
  }

  async deleteMessage(folderId: string, messageId: string): Promise<void> {
    const { trashFolder } = this.options;
    if (trashFolder !== undefined && trashFolder !== folderId) {
      await this.createFolder(trashFolder);
    }

    await this.run("delete message", async () => {
      const lock = await this.lockFolder(folderId);
      try {
        if (trashFolder !== undefined && trashFolder !== folderId) {
          const moved = await this.client.messageMove(messageId, trashFolder, { uid: true });
          if (!moved) {
            throw new TransportError("delete message", `could not move message ${messageId} to "${trashFolder}"`);
          }
        } else {
          const deleted = await this.client.messageDelete(messageId, { uid: true });
          if (!deleted) {
            throw new TransportError("delete message", `server refused to delete message ${messageId}`);
          }
        }
      } finally {
        lock.release();
      }
    });
  }

  async createFolder(folderId: string): Promise<void> {
    const existing = new Set(await this.mailboxPaths());
    const segments = folderId.split(this.options.folderSeparator);

    for (let i = 1; i <= segments.length; i++) {
      const path = segments.slice(0, i).join(this.options.folderSeparator);
      if (existing.has(path)) continue;
      await this.run("create folder", () => this.client.mailboxCreate(path));
      await this.options.logger.info(`Created folder "${path}"`);
      existing.add(path);
    }
  }

  async listFolders(parentFolderId?: string): Promise<string[]> {
    const paths = await this.mailboxPaths();
    const matching =
      parentFolderId === undefined
        ? paths
        : paths.filter((p) => p.startsWith(parentFolderId + this.options.folderSeparator));
    return matching.sort();
  }

  private async mailboxPaths(): Promise<string[]> {
    const tree = await this.run("list folders", () => this.client.list());
    return tree.map((box) => box.path);
  }

  /**
   * Open a folder, turning "no such mailbox" into FolderNotFoundError.
   */
  private async lockFolder(folderId: string): Promise<{ release(): void }> {
    try {
      return await this.client.getMailboxLock(folderId);
    } catch (err) {
      const paths = await this.mailboxPaths();
      if (!paths.includes(folderId)) throw new FolderNotFoundError(folderId);
      throw err;
    }
  }

  /**
   * Run one transport call under the configured timeout. Errors that are not
   * already ours come back as TransportError.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const { timeoutMs, logger } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransportError(operation, `timed out after ${timeoutMs} ms`, { retryable: true })),
        timeoutMs
      );
    });

    try {
      return await Promise.race([fn(), timeout]);
    } catch (err) {
      if (err instanceof DriveError) throw err;
      await logger.debug(`${operation} failed: ${messageOf(err)}`);
      throw new TransportError(operation, messageOf(err), {
        cause: err,
        retryable: !isAuthenticationFailure(err),
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

function isAuthenticationFailure(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "authenticationFailed" in err &&
    err.authenticationFailed === true
  );
}

/**
 * Attachment sizes from the body structure, for messages without the size
 * header. Base64 sizes are converted to decoded bytes approximately.
 */
function attachmentsOf(node: StructureNode | undefined): AttachmentInfo[] {
  if (!node) return [];
  const found: AttachmentInfo[] = [];
  const visit = (n: StructureNode): void => {
    if (n.disposition === "attachment") {
      const encoded = n.size ?? 0;
      const size = n.encoding === "base64" ? Math.floor((encoded * 3) / 4) : encoded;
      found.push({ size });
    }
    for (const child of n.childNodes ?? []) visit(child);
  };
  visit(node);
  return found;
}
