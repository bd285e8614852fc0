/**
 * Subject or issuer fields extracted from a certificate.
 *
 * Absent attributes carry the `'Unknown'` placeholder.
 */
export interface DistinguishedName {
  commonName: string;
  organization: string;
}

/**
 * The cached, clock-independent view of a peer certificate.
 */
export interface ParsedCertificate {
  subject: DistinguishedName;
  issuer: DistinguishedName;
  notBefore: Date;
  notAfter: Date;

  /** Serial number in decimal. */
  serialNumber: string;

  /** X.509 version label: `v1`, `v2` or `v3`. */
  version: string;
}

/**
 * Certificate details as returned to callers.
 *
 * `daysUntilExpiry` is computed at read time and is negative once the
 * certificate has expired.
 */
export interface CertificateInfo {
  subject: DistinguishedName;
  issuer: DistinguishedName;

  /** ISO-8601 timestamp. */
  notBefore: string;

  /** ISO-8601 timestamp. */
  notAfter: string;

  daysUntilExpiry: number;
  serialNumber: string;
  version: string;
}

/**
 * Target of a TLS certificate fetch.
 */
export interface CertificateTarget {
  host: string;
  port: number;
  timeoutMs: number;

  /** Verify the chain and hostname during the handshake. */
  verify: boolean;
}

/**
 * Performs a TLS handshake and resolves with the peer certificate in DER form.
 */
export type CertificateFetcher = (target: CertificateTarget) => Promise<Buffer>;
