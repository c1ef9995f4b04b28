const BASE64_BODY = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict base64 decoding. Whitespace is ignored; characters outside the standard
 * alphabet, a length that is not a multiple of four or misplaced padding give null.
 */
export function decodeBase64(value: string): Buffer | null {
  const compact = value.replace(/\s+/g, '');
  if (!BASE64_BODY.test(compact)) return null;
  return Buffer.from(compact, 'base64');
}
