/** Reads a piped scenario; `null` when stdin is a terminal or empty. */
export async function readStdin(): Promise<string | null> {
  if (process.stdin.isTTY) return null;

  process.stdin.setEncoding('utf-8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text.trim() || null;
}
