export interface CommandOutput {
  write(line: string): void;
}

export const stdoutOutput: CommandOutput = {
  write: (line) => console.log(line),
};
