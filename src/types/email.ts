export interface RawMessage {
  uid: number;
  arrivalDate: Date;
  raw: Buffer;
}

export interface EmailHeaders {
  [key: string]: string | undefined;
  'message-id'?: string;
  'list-unsubscribe'?: string;
  'list-id'?: string;
  'from'?: string;
  'subject'?: string;
  'date'?: string;
}

export interface NormalizedMessage {
  messageId: string;
  uid: number;
  arrivalDate: Date;
  senderName: string;
  senderAddress: string;
  senderDomain: string;
  subject: string;
  bodyText: string;
  bodyHtml?: string;
  rawHeaderBlock: string;
  headers: EmailHeaders;
}

export type DecodeResult =
  | { kind: 'ok'; message: NormalizedMessage }
  | { kind: 'failed'; uid: number; reason: string };

export interface DecodeErrorEntry {
  uid: number;
  reason: string;
}

export type UnsubscribeMethod = 'http' | 'mailto';

export interface UnsubscribeInfo {
  url: string;
  token: string;
  method: UnsubscribeMethod;
  source: 'header' | 'body';
}

/**
 * Supplier of raw message bytes keyed by IMAP UID. Implementations hold a
 * single connection and are used sequentially.
 */
export interface Mailbox {
  listCandidateUids(since: Date): Promise<number[]>;
  fetch(uid: number): Promise<RawMessage>;
  close(): Promise<void>;
}

export type MailboxFactory = () => Promise<Mailbox>;
