import { convert } from 'html-to-text';
import { NormalizedMessage, UnsubscribeInfo } from '../types/email';

const UNSUBSCRIBE_KEYWORDS = /unsubscribe|opt[-_]?out|remove/i;

// Path segments that name the action rather than the subscription
const GENERIC_SEGMENTS = new Set([
  'unsubscribe',
  'unsub',
  'optout',
  'opt-out',
  'opt_out',
  'remove',
  'preferences',
  'manage',
  'email',
  'emails',
  'list-unsubscribe',
  'oneclick',
  'one-click',
  'index.html',
  'index.php'
]);

// Quoted-printable remnants left in links by broken encoders
const QP_REMNANTS: Array<[RegExp, string]> = [
  [/=3A/g, ':'],
  [/=2E/g, '.'],
  [/=2F/g, '/'],
  [/=5F/g, '_'],
  [/=2D/g, '-'],
  [/=3D/g, '='],
  [/=26/g, '&'],
  [/=3F/g, '?']
];

// Anchors rendered by html-to-text (and by mailparser for HTML-only mail): `label [href]`
const TEXT_LINK = /([^[\]\n]*)\[((?:https?:\/\/|mailto:)[^\s\]]+)\]/gi;

export interface TextLink {
  label: string;
  href: string;
}

export function cleanUrl(url: string): string {
  let cleaned = url.trim().replace(/&amp;/gi, '&');
  if (/=3[ADF]|=2F/.test(cleaned)) {
    for (const [pattern, replacement] of QP_REMNANTS) {
      cleaned = cleaned.replace(pattern, replacement);
    }
  }
  return cleaned.trim();
}

function isHttp(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

function isMailto(url: string): boolean {
  return /^mailto:/i.test(url);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Picks the most specific component of an unsubscribe URL: the longest query
 * value (tracking parameters excluded) or non-generic path segment. Falls back
 * to the URL itself, so the result is never empty.
 */
export function deriveToken(url: string): string {
  if (isMailto(url)) return url;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const candidates: string[] = [];
  for (const [key, value] of parsed.searchParams) {
    if (!key.toLowerCase().startsWith('utm_') && value.trim()) {
      candidates.push(value.trim());
    }
  }
  const segments = parsed.pathname.split('/').filter(Boolean).map(safeDecode);
  for (const segment of segments.reverse()) {
    if (!GENERIC_SEGMENTS.has(segment.toLowerCase())) {
      candidates.push(segment);
    }
  }

  let best = '';
  for (const candidate of candidates) {
    if (candidate.length > best.length) best = candidate;
  }
  return best || url;
}

export function toUnsubscribeInfo(url: string, source: UnsubscribeInfo['source']): UnsubscribeInfo {
  return {
    url,
    token: deriveToken(url),
    method: isMailto(url) ? 'mailto' : 'http',
    source
  };
}

/** Parses a `List-Unsubscribe` value; HTTP(S) targets win over mailto. */
export function parseListUnsubscribe(value: string): string | undefined {
  const bracketed = [...value.matchAll(/<([^>]+)>/g)].map(match => match[1]);
  const entries = (bracketed.length > 0 ? bracketed : value.split(','))
    .map(cleanUrl)
    .filter(entry => entry.length > 0);

  return entries.find(isHttp) ?? entries.find(isMailto);
}

function trimTrailingPunctuation(url: string): string {
  return url.replace(/[.,;:!?)\]]+$/, '');
}

export function extractTextLinks(text: string): TextLink[] {
  return [...text.matchAll(TEXT_LINK)].map(match => ({ label: match[1].trim(), href: cleanUrl(match[2]) }));
}

export function htmlToLinkText(html: string): string {
  return convert(html, {
    wordwrap: false,
    selectors: [{ selector: 'img', format: 'skip' }]
  });
}

function findLabelledLink(text: string): string | undefined {
  return extractTextLinks(text).find(link =>
    (isHttp(link.href) || isMailto(link.href)) &&
    (UNSUBSCRIBE_KEYWORDS.test(link.href) || UNSUBSCRIBE_KEYWORDS.test(link.label))
  )?.href;
}

/** Labelled links from the HTML part first, then from the text; bare URLs only match by their own wording. */
export function findBodyUnsubscribeLink(text: string, html?: string): string | undefined {
  const labelled = (html ? findLabelledLink(htmlToLinkText(html)) : undefined) ?? findLabelledLink(text);
  if (labelled) return labelled;

  const urls = text.match(/(?:https?:\/\/|mailto:)[^\s<>"'()[\]]+/gi) ?? [];
  return urls.map(url => trimTrailingPunctuation(cleanUrl(url))).find(url => UNSUBSCRIBE_KEYWORDS.test(url));
}

export function extractUnsubscribe(message: NormalizedMessage): UnsubscribeInfo | undefined {
  const header = message.headers['list-unsubscribe'];
  if (header) {
    const url = parseListUnsubscribe(header);
    if (url) return toUnsubscribeInfo(url, 'header');
  }

  const bodyLink = findBodyUnsubscribeLink(message.bodyText, message.bodyHtml);
  return bodyLink ? toUnsubscribeInfo(bodyLink, 'body') : undefined;
}
