const BASE64URL = /^[A-Za-z0-9_-]*$/u;

export const toBase64Url = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64url");

export const fromBase64Url = (base64Url: string): Uint8Array => {
  // Node silently skips characters outside the alphabet
  if (!BASE64URL.test(base64Url) || base64Url.length % 4 === 1) {
    throw new Error(`Invalid base64url text of length ${base64Url.length}`);
  }
  return new Uint8Array(Buffer.from(base64Url, "base64url"));
};
