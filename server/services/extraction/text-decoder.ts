const REPLACEMENT_CHARACTER = '\uFFFD';

/**
 * Decodes uploaded plain text. UTF-8 is tried first; any replacement character in the
 * result means the bytes were not UTF-8 and they are re-read as Latin-1.
 */
export function decodePlainText(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const utf8 = buffer.toString('utf8');
  if (!utf8.includes(REPLACEMENT_CHARACTER)) return utf8;
  return buffer.toString('latin1');
}
