/**
 * MIME Message Encoder
 *
 * Builds an RFC 2822 message for the Gmail API `message.raw` field and
 * base64url encodes it.
 *
 * - Headers and part separators use CRLF
 * - HTML body and attachments are base64 encoded, wrapped at 76 columns
 * - No attachments: a single text/html part
 * - Attachments: multipart/mixed with the HTML part first
 */

import { randomBytes } from 'crypto';
import type { MimeMessageInput } from '../types.js';

const CRLF = '\r\n';

/**
 * Encodes a header value using RFC 2047 encoded-word syntax if it contains
 * non-ASCII characters. ASCII-only values pass through unchanged.
 */
export function encodeHeaderValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  if (/^[\x00-\x7F]*$/.test(value)) return value;
  const encoded = Buffer.from(value, 'utf-8').toString('base64');
  return `=?UTF-8?B?${encoded}?=`;
}

function wrapBase64(data: Buffer): string {
  const encoded = data.toString('base64');
  return encoded.match(/.{1,76}/g)?.join(CRLF) ?? '';
}

function toBase64Url(message: string): string {
  return Buffer.from(message, 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}

/**
 * Builds the plain RFC 2822 text (before base64url encoding).
 */
export function buildMimeMessage(
  input: MimeMessageInput,
  boundary: string = `outreach_${randomBytes(12).toString('hex')}`
): string {
  const headerLines: string[] = [];
  if (input.from) {
    headerLines.push(`From: ${input.from}`);
  }
  headerLines.push(
    `To: ${input.to.join(', ')}`,
    `Subject: ${encodeHeaderValue(input.subject)}`,
    'MIME-Version: 1.0',
  );

  const htmlPart = [
    'Content-Type: text/html; charset=utf-8',
    'Content-Transfer-Encoding: base64',
    '',
    wrapBase64(Buffer.from(input.html, 'utf-8')),
  ].join(CRLF);

  if (input.attachments.length === 0) {
    return [...headerLines, htmlPart].join(CRLF);
  }

  headerLines.push(`Content-Type: multipart/mixed; boundary="${boundary}"`);

  const parts = [htmlPart];
  for (const attachment of input.attachments) {
    const filename = encodeHeaderValue(attachment.filename).replace(/"/g, '');
    parts.push([
      `Content-Type: ${attachment.contentType}; name="${filename}"`,
      `Content-Disposition: attachment; filename="${filename}"`,
      'Content-Transfer-Encoding: base64',
      '',
      wrapBase64(attachment.content),
    ].join(CRLF));
  }

  const body = parts.map((part) => `--${boundary}${CRLF}${part}`).join(CRLF);
  return [...headerLines, '', `${body}${CRLF}--${boundary}--`].join(CRLF);
}

/**
 * Encodes a draft as a base64url RFC 2822 message for the Gmail API.
 */
export function encodeMimeMessage(input: MimeMessageInput, boundary?: string): string {
  return toBase64Url(buildMimeMessage(input, boundary));
}
