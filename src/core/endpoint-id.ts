/**
 * Endpoint ids in Scout URLs are base64 (normally the URL-safe alphabet)
 * of a readable name such as "Controller/UsersController/show".
 */

type Alphabet = "base64url" | "base64";

const PATTERNS: Record<Alphabet, RegExp> = {
  base64url: /^[A-Za-z0-9_-]+={0,2}$/,
  base64: /^[A-Za-z0-9+/]+={0,2}$/,
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode only canonical input: Buffer.from() skips characters outside the
 * alphabet and ignores stray trailing bits, so re-encode and compare.
 */
function strictDecode(token: string, alphabet: Alphabet): Uint8Array | null {
  if (!PATTERNS[alphabet].test(token)) return null;
  const body = token.replace(/=+$/, "");
  if (body.length % 4 === 1) return null;

  const bytes = Buffer.from(body, alphabet);
  if (bytes.toString(alphabet).replace(/=+$/, "") !== body) return null;
  return bytes;
}

function toUtf8(bytes: Uint8Array | null): string | null {
  if (!bytes) return null;
  try {
    return utf8.decode(bytes);
  } catch {
    return null; // not valid UTF-8
  }
}

export function decodeEndpointId(endpointId: string): string {
  return (
    toUtf8(strictDecode(endpointId, "base64url")) ??
    toUtf8(strictDecode(endpointId, "base64")) ??
    endpointId
  );
}

export function encodeEndpointId(name: string): string {
  return Buffer.from(name, "utf-8").toString("base64url");
}
