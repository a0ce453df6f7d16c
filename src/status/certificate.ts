import type { Result } from "neverthrow";
import { CertificateSchema } from "../types/resources";
import type { CertificateStatus } from "../types/domain";
import { parseRfc3339 } from "../utils/time";
import { decodeDocument, type DocumentError, present } from "./document";

// Status of a standalone cert-manager Certificate resource.
export function parseCertificate(text: string): Result<CertificateStatus, DocumentError> {
  return decodeDocument(CertificateSchema, text).map((cert) => {
    let ready: boolean | null = null;
    for (const c of present(cert.status?.conditions)) {
      if (c.type === "Ready") ready = c.status === "True";
    }

    return {
      ready,
      notAfter: parseRfc3339(cert.status?.notAfter),
      renewalTime: parseRfc3339(cert.status?.renewalTime),
      dnsNames: present(cert.spec?.dnsNames),
    };
  });
}
