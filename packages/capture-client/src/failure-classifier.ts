import type { DeliveryFailureKind } from "./types.js";

export type ResponseClassification = "delivered" | Extract<DeliveryFailureKind, "transient" | "rejected">;

const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);

export const classifyResponseStatus = (status: number): ResponseClassification => {
  if (status >= 200 && status <= 299) {
    return "delivered";
  }
  if (status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status)) {
    return "transient";
  }
  return "rejected";
};

const CERTIFICATE_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_REVOKED",
  "CERT_UNTRUSTED",
  "CERT_REJECTED",
  "CERT_SIGNATURE_FAILURE",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_DECRYPT_CERT_SIGNATURE",
  "HOSTNAME_MISMATCH",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const MAX_CAUSE_DEPTH = 5;

/** Walks `error.cause` collecting string `code` properties (undici wraps socket errors). */
export const collectErrorCodes = (error: unknown): string[] => {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && typeof current === "object" && current !== null; depth += 1) {
    if ("code" in current && typeof current.code === "string") {
      codes.push(current.code);
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return codes;
};

export const isCertificateErrorCode = (code: string): boolean =>
  CERTIFICATE_ERROR_CODES.has(code) || code.startsWith("ERR_SSL_") || code.startsWith("ERR_TLS_CERT");

export const classifyThrownError = (error: unknown, signal?: AbortSignal): DeliveryFailureKind => {
  if (signal?.aborted) {
    return "aborted";
  }
  if (collectErrorCodes(error).some(isCertificateErrorCode)) {
    return "security";
  }
  return "transient";
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const codes = collectErrorCodes(error);
    const suffix = codes.length > 0 ? ` (${codes.join(", ")})` : "";
    return `${error.name}: ${error.message}${suffix}`;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
};
