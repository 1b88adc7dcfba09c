import { execFile } from 'child_process';

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

// Runs an executable without a shell. Resolves with a non-zero exit code;
// rejects only when the command could not run at all.
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { timeout: options.timeoutMs ?? 0, signal: options.signal, encoding: 'utf-8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const code: unknown = error.code;
        if (typeof code === 'number') {
          resolve({ exitCode: code, stdout, stderr });
          return;
        }
        reject(error);
      }
    );
  });
};

// Last non-empty line of command output
export function lastLine(output: string): string {
  const lines = output.split('\n').map(line => line.trim()).filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] : '';
}
