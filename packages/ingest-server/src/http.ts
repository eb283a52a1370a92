export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "x-content-type-options": "nosniff",
  "x-frame-options": "DENY",
  "x-xss-protection": "1; mode=block",
  "strict-transport-security": "max-age=31536000; includeSubDomains",
};

const CORS_ALLOWED_METHODS = "GET, POST, OPTIONS";
const CORS_ALLOWED_HEADERS = "content-type, x-actiontrail-event-id, x-actiontrail-attempt";
const CORS_MAX_AGE_SECONDS = "600";

export const jsonResponse = (status: number, body: unknown, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });

export const detailResponse = (status: number, detail: string, headers?: Record<string, string>): Response =>
  jsonResponse(status, { detail }, headers);

export const normalizePath = (path: string): string =>
  path.length > 1 && path.endsWith("/") ? path.replace(/\/+$/, "") || "/" : path;

export interface CorsPolicy {
  readonly allowedOrigins: ReadonlyArray<string>;
}

export const resolveAllowedOrigin = (policy: CorsPolicy, origin: string | null): string | undefined => {
  if (!origin) {
    return undefined;
  }
  if (policy.allowedOrigins.includes("*")) {
    return "*";
  }
  return policy.allowedOrigins.includes(origin) ? origin : undefined;
};

export const corsHeaders = (allowedOrigin: string | undefined, preflight: boolean): Record<string, string> => {
  if (!allowedOrigin) {
    return {};
  }
  const headers: Record<string, string> = {
    "access-control-allow-origin": allowedOrigin,
    vary: "origin",
  };
  if (preflight) {
    headers["access-control-allow-methods"] = CORS_ALLOWED_METHODS;
    headers["access-control-allow-headers"] = CORS_ALLOWED_HEADERS;
    headers["access-control-max-age"] = CORS_MAX_AGE_SECONDS;
  }
  return headers;
};

/** Copies `response` with extra headers; existing values win. */
export const withHeaders = (response: Response, headers: Record<string, string>): Response => {
  const merged = new Headers(headers);
  response.headers.forEach((value, key) => merged.set(key, value));
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers: merged,
  });
};
