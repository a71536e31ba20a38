// cli/output.ts — Where CLI commands write
//
// stdout: command results (JSON, or one line per spell)
// stderr: diagnostics

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export const processOutput: CliOutput = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

/** Writes a value as pretty-printed JSON followed by a newline. */
export function writeJson(output: CliOutput, value: unknown): void {
  output.out(JSON.stringify(value, null, 2) + '\n');
}
