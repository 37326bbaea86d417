/**
 * Stream processing utilities
 */

/**
 * Read lines from a byte stream
 *
 * Accepts `\n` and `\r\n` line endings. A trailing line without a newline
 * is still yielded; a trailing empty line is not. Stopping iteration early
 * cancels the stream.
 *
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('>')) {
 *     console.log('Found header:', line);
 *   }
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      let start = 0;
      let newline = buffer.indexOf("\n", start);
      while (newline !== -1) {
        const end = newline > start && buffer[newline - 1] === "\r" ? newline - 1 : newline;
        yield buffer.slice(start, end);
        start = newline + 1;
        newline = buffer.indexOf("\n", start);
      }
      buffer = buffer.slice(start);
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    }
  } catch (error) {
    finished = true;
    throw error;
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
