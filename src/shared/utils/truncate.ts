/**
 * Decode at most `maxBytes` of UTF-8 without splitting a multi-byte
 * character.
 */
export const truncateUtf8Bytes = (buffer: Buffer, maxBytes: number): string => {
  if (buffer.length <= maxBytes) return buffer.toString("utf8");

  let end = maxBytes;
  // Step back over continuation bytes (10xxxxxx) to a character boundary
  while (end > 0 && (buffer.readUInt8(end) & 0xc0) === 0x80) end--;
  return buffer.subarray(0, end).toString("utf8");
};

/** Cut a string to at most `maxBytes` of UTF-8. */
export const truncateUtf8 = (input: string, maxBytes: number): string => {
  const buffer = Buffer.from(input, "utf8");
  return buffer.length <= maxBytes ? input : truncateUtf8Bytes(buffer, maxBytes);
};
