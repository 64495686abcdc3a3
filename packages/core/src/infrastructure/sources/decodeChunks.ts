/**
 * Turn a byte stream into UTF-8 text chunks.
 *
 * A multi-byte character split across two chunks is reassembled; invalid
 * sequences become U+FFFD and a leading BOM is dropped. String chunks pass
 * through untouched.
 */
export async function* decodeChunks(chunks: AsyncIterable<string | Uint8Array>): AsyncIterable<string> {
  const decoder = new TextDecoder('utf-8');

  for await (const chunk of chunks) {
    if (typeof chunk === 'string') {
      const pending = decoder.decode();
      if (pending) yield pending;
      if (chunk) yield chunk;
      continue;
    }
    const text = decoder.decode(chunk, { stream: true });
    if (text) yield text;
  }

  const rest = decoder.decode();
  if (rest) yield rest;
}
