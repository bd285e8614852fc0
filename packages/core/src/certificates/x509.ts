import { X509Certificate } from 'node:crypto';

import type { DistinguishedName, ParsedCertificate } from '../types/certificate.js';

import { CertificateParseError, errorMessage } from '../errors.js';

/**
 * Placeholder for a subject or issuer attribute the certificate lacks.
 */
export const UNKNOWN_FIELD = 'Unknown';

/**
 * Decode a DER certificate into the fields the certificate monitor reports.
 *
 * Throws `CertificateParseError` for anything `node:crypto` cannot decode or
 * whose validity dates are unreadable. Missing name attributes do not fail
 * the parse; they become `UNKNOWN_FIELD`.
 */
export function parseCertificate(der: Buffer): ParsedCertificate {
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(der);
  } catch (error) {
    throw new CertificateParseError(`Invalid certificate: ${errorMessage(error)}`, { cause: error });
  }

  return {
    subject: parseDistinguishedName(certificate.subject),
    issuer: parseDistinguishedName(certificate.issuer),
    notBefore: parseValidityDate(certificate.validFrom, 'notBefore'),
    notAfter: parseValidityDate(certificate.validTo, 'notAfter'),
    serialNumber: hexToDecimal(certificate.serialNumber),
    version: `v${readVersion(certificate.raw)}`,
  };
}

/**
 * Pick CN and O out of a name in `node:crypto` form (`KEY=value` per line,
 * values escaped as in RFC 2253). The first occurrence of a key wins.
 */
export function parseDistinguishedName(text: string): DistinguishedName {
  const fields = new Map<string, string>();
  for (const line of text.split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (!fields.has(key)) fields.set(key, unescapeAttributeValue(line.slice(eq + 1)));
  }

  return {
    commonName: fields.get('CN') ?? UNKNOWN_FIELD,
    organization: fields.get('O') ?? UNKNOWN_FIELD,
  };
}

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/**
 * Undo RFC 2253 escaping: `\,` style escapes give the character itself, and
 * runs of `\HH` pairs are UTF-8 bytes.
 */
export function unescapeAttributeValue(value: string): string {
  if (!value.includes('\\')) return value;

  let out = '';
  const bytes: number[] = [];
  const flushBytes = (): void => {
    if (bytes.length === 0) return;
    out += Buffer.from(bytes).toString('utf8');
    bytes.length = 0;
  };

  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);
    if (char !== '\\' || i + 1 === value.length) {
      flushBytes();
      out += char;
      continue;
    }

    const pair = value.slice(i + 1, i + 3);
    if (HEX_PAIR.test(pair)) {
      bytes.push(Number.parseInt(pair, 16));
      i += 2;
    } else {
      flushBytes();
      out += value.charAt(i + 1);
      i += 1;
    }
  }
  flushBytes();
  return out;
}

function parseValidityDate(text: string, field: string): Date {
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new CertificateParseError(`Unreadable ${field} date: ${text}`);
  }
  return date;
}

function hexToDecimal(hex: string): string {
  const digits = hex.replace(/[^0-9a-f]/gi, '');
  if (digits.length === 0) throw new CertificateParseError(`Unreadable serial number: ${hex}`);
  return BigInt(`0x${digits}`).toString(10);
}

// Offset of the content octets of the DER element starting at `offset`.
function contentOffset(der: Uint8Array, offset: number): number {
  const lengthByte = der[offset + 1];
  if (lengthByte === undefined) throw new CertificateParseError('Truncated certificate');
  if (lengthByte < 0x80) return offset + 2;
  return offset + 2 + (lengthByte & 0x7f);
}

/**
 * X.509 version number (1-based) from the DER encoding.
 *
 * `node:crypto` does not expose it. The field is the optional `[0]` element
 * opening the TBSCertificate sequence; when absent the certificate is v1.
 */
export function readVersion(der: Uint8Array): number {
  const tbs = contentOffset(der, 0);
  const first = contentOffset(der, tbs);
  if (der[first] !== 0xa0) return 1;

  const integer = contentOffset(der, first);
  const value = der[contentOffset(der, integer)];
  if (der[integer] !== 0x02 || value === undefined) {
    throw new CertificateParseError('Malformed certificate version');
  }
  return value + 1;
}
