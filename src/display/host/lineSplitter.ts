/**
 * Buffers chunks from a stream and calls `onLine` once per `\n`-terminated
 * line. A trailing partial line waits for the next chunk.
 */
export function createLineSplitter(onLine: (line: string) => void): (chunk: string | Buffer) => void {
  let pending = '';
  return chunk => {
    const lines = (pending + chunk.toString()).split('\n');
    pending = lines.pop() ?? '';
    lines.forEach(line => onLine(line));
  };
}
