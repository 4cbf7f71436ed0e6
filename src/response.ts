export function buildRequest(host: string): Buffer {
  return Buffer.from(`GET / HTTP/1.1\r\nHost: ${host}\r\n\r\n`, "ascii");
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Last non-blank line of the payload, with surrounding whitespace trimmed
 * (not just the line break). Headers and body are not told apart: icanhazip
 * puts the address on the final line either way.
 */
export function lastLine(payload: Buffer): string | null {
  const lines = splitLines(payload.toString("utf8"));
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (line.length > 0) {
      return line;
    }
  }
  return null;
}
