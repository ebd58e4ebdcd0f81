/**
 * Where the tracker reports to. `message` carries status lines, `print` carries
 * rendered reports (history, summaries). A terminal gets both on the process
 * streams; the MCP server buffers them per tool call because stdout is the
 * protocol channel there.
 */
export interface SessionOutput {
  message(text: string): void;
  print(text: string): void;
}

export const consoleOutput: SessionOutput = {
  message: (text) => console.error(text),
  print: (text) => {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  }
};

export class BufferedOutput implements SessionOutput {
  private readonly lines: string[] = [];

  message(text: string): void {
    this.lines.push(text);
  }

  print(text: string): void {
    this.lines.push(text.endsWith("\n") ? text.slice(0, -1) : text);
  }

  text(): string {
    return this.lines.join("\n");
  }

  entries(): readonly string[] {
    return this.lines;
  }
}
