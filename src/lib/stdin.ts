/**
 * Read all of stdin as text. Returns '' when stdin is a terminal, so a
 * manual run never waits for input.
 */
export async function readStdin(
  stream: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin
): Promise<string> {
  if (stream.isTTY) {
    return '';
  }

  stream.setEncoding('utf8');
  let data = '';
  for await (const chunk of stream) {
    data += String(chunk);
  }
  return data;
}
