import { createHmac, randomInt } from "crypto";

const NONCE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const NONCE_LENGTH = 25;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface SigningInput {
  method: string;
  path: string;
  query: QueryParams;
  /** Empty for requests without a body. */
  contentType: string;
  timestamp: string;
  nonce: string;
}

export interface SignedHeaders {
  Authorization: string;
  "On-Nonce": string;
  Date: string;
}

/** Query string with keys in sorted order. Undefined and empty values are dropped. */
export function canonicalQuery(query: QueryParams): string {
  const params = new URLSearchParams();
  for (const key of Object.keys(query).sort()) {
    const value = query[key];
    if (value === undefined || value === "") continue;
    params.append(key, String(value));
  }
  return params.toString();
}

/**
 * The string Onshape verifies: method, nonce, date, content type, path and
 * query, each followed by a newline, then lowercased as a whole.
 */
export function canonicalString(input: SigningInput): string {
  const lines = [
    input.method.toUpperCase(),
    input.nonce,
    input.timestamp,
    input.contentType,
    input.path,
    canonicalQuery(input.query),
  ];
  return lines.map((line) => `${line}\n`).join("").toLowerCase();
}

/** Base64 HMAC-SHA256 of the canonical string, keyed by the secret key. */
export function computeSignature(secretKey: string, input: SigningInput): string {
  return createHmac("sha256", secretKey).update(canonicalString(input), "utf8").digest("base64");
}

export function signHeaders(accessKey: string, secretKey: string, input: SigningInput): SignedHeaders {
  const signature = computeSignature(secretKey, input);
  return {
    Authorization: `On ${accessKey}:HmacSHA256:${signature}`,
    "On-Nonce": input.nonce,
    Date: input.timestamp,
  };
}

/** RFC 1123, UTC, second precision: `Mon, 19 Oct 2026 08:30:00 GMT`. */
export function formatTimestamp(date: Date): string {
  return date.toUTCString();
}

export function generateNonce(): string {
  let nonce = "";
  for (let i = 0; i < NONCE_LENGTH; i++) {
    nonce += NONCE_ALPHABET[randomInt(NONCE_ALPHABET.length)];
  }
  return nonce;
}
