/**
 * Helpers for turning a raw inbound message (as delivered by SES) into
 * the vendor's reply text: pick the text/plain part of a MIME message,
 * undo its transfer encoding, then drop the quoted history.
 */

interface MimePart {
  headers: Record<string, string>;
  body: string;
}

interface BodyCandidates {
  plain: string | null;
  html: string | null;
}

// A block only counts as headers if it carries at least one of these
const KNOWN_HEADERS = new Set([
  'from',
  'to',
  'subject',
  'date',
  'message-id',
  'mime-version',
  'received',
  'return-path',
  'content-type',
  'content-transfer-encoding',
  'content-disposition',
]);

function parseHeaderBlock(block: string): Record<string, string> | null {
  const lines = block.replace(/\r?\n[ \t]+/g, ' ').split(/\r?\n/);
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const match = /^([A-Za-z0-9-]+):\s*(.*)$/.exec(line);
    if (!match) {
      return null;
    }
    headers[match[1].toLowerCase()] = match[2];
  }
  return Object.keys(headers).some((name) => KNOWN_HEADERS.has(name))
    ? headers
    : null;
}

function parsePart(raw: string): MimePart {
  const separator = /\r?\n\r?\n/.exec(raw);
  if (!separator) {
    return { headers: {}, body: raw };
  }
  const headerBlock = raw.slice(0, separator.index);
  const body = raw.slice(separator.index + separator[0].length);
  if (headerBlock === '') {
    return { headers: {}, body };
  }
  const headers = parseHeaderBlock(headerBlock);
  return headers ? { headers, body } : { headers: {}, body: raw };
}

export function decodeQuotedPrintable(text: string): string {
  const latin1 = text
    .replace(/=\r?\n/g, '')
    .replace(/=([0-9A-Fa-f]{2})/g, (_, hex: string) =>
      String.fromCharCode(parseInt(hex, 16)),
    );
  return Buffer.from(latin1, 'latin1').toString('utf8');
}

function decodeTransferEncoding(part: MimePart): string {
  const encoding = (part.headers['content-transfer-encoding'] ?? '').toLowerCase();
  if (encoding === 'base64') {
    return Buffer.from(part.body.replace(/\s+/g, ''), 'base64').toString('utf8');
  }
  if (encoding === 'quoted-printable') {
    return decodeQuotedPrintable(part.body);
  }
  return part.body;
}

function findBody(part: MimePart): BodyCandidates {
  const rawType = part.headers['content-type'] ?? 'text/plain';
  const type = rawType.toLowerCase();

  if (type.startsWith('multipart/')) {
    const result: BodyCandidates = { plain: null, html: null };
    const boundary = /boundary="?([^";]+)"?/i.exec(rawType);
    if (!boundary) {
      return result;
    }
    for (const segment of part.body.split(`--${boundary[1]}`).slice(1)) {
      if (segment.startsWith('--')) {
        break;
      }
      const found = findBody(parsePart(segment.replace(/^\r?\n/, '')));
      result.plain = result.plain ?? found.plain;
      result.html = result.html ?? found.html;
    }
    return result;
  }

  if (type.startsWith('text/html')) {
    return { plain: null, html: decodeTransferEncoding(part) };
  }
  if (type.startsWith('text/')) {
    return { plain: decodeTransferEncoding(part), html: null };
  }
  // attachments and other non-text parts
  return { plain: null, html: null };
}

export function htmlToText(html: string): string {
  return html
    .replace(/<(br|\/p|\/div)\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Drop quoted lines (`>`) and everything from an
 * "On <date>, <someone@example.com> wrote:" attribution onwards.
 */
export function stripQuotedReply(text: string): string {
  const kept: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('>')) {
      continue;
    }
    if (trimmed.startsWith('On ') && trimmed.includes('@')) {
      break;
    }
    kept.push(line);
  }
  return kept.join('\n').trim();
}

/**
 * Raw message in, reply text out. Content without a recognisable header
 * block is treated as a plain-text body.
 */
export function extractReplyText(rawContent: string): string {
  const { plain, html } = findBody(parsePart(rawContent));
  const text = plain ?? (html !== null ? htmlToText(html) : '');
  return stripQuotedReply(text);
}
