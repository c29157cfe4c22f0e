import type { Readable } from "node:stream";

export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Reads piped input to the end; an interactive terminal yields "". */
export async function readStdin(input: Readable = process.stdin): Promise<string> {
  if ("isTTY" in input && input.isTTY === true) {
    return "";
  }
  input.setEncoding("utf8");
  let data = "";
  for await (const chunk of input) {
    data += String(chunk);
  }
  return data;
}
