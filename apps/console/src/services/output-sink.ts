/**
 * Output Sink
 *
 * Everything the console prints goes through one sink so that command output,
 * live updates and log lines are written as whole blocks.
 */

export interface OutputSink {
  write(lines: string | readonly string[]): void;
}

/**
 * Writes blocks to a stream (stdout by default) in a single call each
 */
export class StreamOutputSink implements OutputSink {
  private readonly stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
  }

  write(lines: string | readonly string[]): void {
    const block = typeof lines === "string" ? [lines] : lines;
    if (block.length === 0) return;
    this.stream.write(`${block.join("\n")}\n`);
  }
}
