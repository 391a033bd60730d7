export type {
  MailTransport,
  TransportMessage,
  AttachmentInfo,
  OutgoingAttachment,
} from "./types.js";
export { ImapTransport, type ImapTransportOptions } from "./imap-transport.js";
export { MemoryTransport, type MemoryTransportOptions } from "./memory-transport.js";
export { buildPartMessage } from "./message-builder.js";
export { parsePartMessage, declaredSizeFromHeaders, type ParsedPartMessage } from "./mime-parser.js";
