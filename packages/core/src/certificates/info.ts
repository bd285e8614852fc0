import type { CertificateInfo, ParsedCertificate } from '../types/certificate.js';

import { daysBetween } from '../utils/time.js';

/**
 * Derive the caller-facing view of a parsed certificate at time `now`.
 */
export function describeCertificate(certificate: ParsedCertificate, now: number): CertificateInfo {
  return {
    subject: { ...certificate.subject },
    issuer: { ...certificate.issuer },
    notBefore: certificate.notBefore.toISOString(),
    notAfter: certificate.notAfter.toISOString(),
    daysUntilExpiry: daysBetween(now, certificate.notAfter.getTime()),
    serialNumber: certificate.serialNumber,
    version: certificate.version,
  };
}
