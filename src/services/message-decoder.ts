import { simpleParser, ParsedMail, AddressObject, HeaderLines } from 'mailparser';
import { DecodeResult, EmailHeaders, NormalizedMessage, RawMessage } from '../types/email';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('MessageDecoder');

const HEADER_NAME = /^[!-9;-~]+$/;

export interface Sender {
  name: string;
  address: string;
  domain: string;
}

/** Domain after the last `@`; an address without one is its own domain. */
export function senderDomainOf(address: string): string {
  const at = address.lastIndexOf('@');
  return (at === -1 ? address : address.slice(at + 1)).trim().toLowerCase();
}

export function fallbackMessageId(uid: number, arrivalDate: Date): string {
  return `uid:${uid}@${arrivalDate.toISOString()}`;
}

function firstAddress(from: AddressObject | undefined): { name: string; address: string } | undefined {
  const entry = from?.value[0];
  if (!entry) return undefined;

  // Group syntax puts the real mailboxes one level down
  const mailbox = entry.group?.[0] ?? entry;
  return { name: mailbox.name ?? '', address: mailbox.address ?? '' };
}

export function resolveSender(from: AddressObject | undefined, rawFrom: string | undefined): Sender {
  const parsed = firstAddress(from);
  const address = (parsed?.address || rawFrom || '').trim().toLowerCase();

  return {
    name: (parsed?.name ?? '').trim(),
    address,
    domain: senderDomainOf(address)
  };
}

function rawValueOf(line: HeaderLines[number]): string {
  return line.line
    .slice(line.key.length + 1)
    .replace(/\r?\n[ \t]+/g, ' ')
    .trim();
}

// Decoded strings where mailparser kept one, the unfolded raw value for structured headers
function collectHeaders(mail: ParsedMail, lines: HeaderLines): EmailHeaders {
  const headers: EmailHeaders = {};
  for (const line of lines) {
    if (headers[line.key] !== undefined) continue;
    const parsed = mail.headers.get(line.key);
    headers[line.key] = typeof parsed === 'string' ? parsed.trim() : rawValueOf(line);
  }
  return headers;
}

/**
 * Turns one raw mailbox message into a normalized message. Never throws:
 * unusable input comes back as a `failed` result so the caller can move on.
 */
export async function decodeMessage(raw: RawMessage): Promise<DecodeResult> {
  if (raw.raw.length === 0) {
    return { kind: 'failed', uid: raw.uid, reason: 'empty message' };
  }

  let mail: ParsedMail;
  try {
    mail = await simpleParser(raw.raw, { skipTextToHtml: true, skipImageLinks: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn({ uid: raw.uid, reason }, 'Message parse failed');
    return { kind: 'failed', uid: raw.uid, reason };
  }

  const headerLines = mail.headerLines.filter(line => HEADER_NAME.test(line.key));
  if (headerLines.length === 0) {
    return { kind: 'failed', uid: raw.uid, reason: 'no parseable headers' };
  }

  const headers = collectHeaders(mail, headerLines);
  const sender = resolveSender(mail.from, headers.from);
  const headerId = (mail.messageId ?? headers['message-id'] ?? '').trim().replace(/^<|>$/g, '');

  const message: NormalizedMessage = {
    messageId: headerId || fallbackMessageId(raw.uid, raw.arrivalDate),
    uid: raw.uid,
    arrivalDate: raw.arrivalDate,
    senderName: sender.name,
    senderAddress: sender.address,
    senderDomain: sender.domain,
    subject: (mail.subject ?? headers.subject ?? '').trim(),
    bodyText: (mail.text ?? '').trim(),
    bodyHtml: typeof mail.html === 'string' ? mail.html : undefined,
    rawHeaderBlock: headerLines.map(line => line.line).join('\r\n'),
    headers
  };

  return { kind: 'ok', message };
}
