import { spawn } from 'child_process';
import { ToolUnavailableError } from '../errors.js';

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

/**
 * Runs one external command to completion. Injected wherever a tool is
 * invoked so tests can stand in for openssl.
 */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

function hasCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

// Both pipes get their listeners before stdin is written, so a child that
// fills its stderr buffer never blocks while we wait on stdout (or the reverse).
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stdinError: Error | undefined;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', err => {
      if (hasCode(err, 'ENOENT', 'EACCES')) reject(new ToolUnavailableError(command, { cause: err }));
      else reject(err);
    });

    // EPIPE here means the child closed stdin early; its exit status decides.
    child.stdin.on('error', err => {
      if (!hasCode(err, 'EPIPE')) stdinError = err;
    });

    child.on('close', (code, signal) => {
      if (stdinError) {
        reject(stdinError);
        return;
      }
      resolve({
        code,
        signal,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });

    child.stdin.end(options.input ?? '');
  });
};

/** Fails fast with ToolUnavailableError when the binary cannot be started. */
export async function checkTool(tool: string, runner: CommandRunner = runCommand): Promise<string> {
  const result = await runner(tool, ['version']);
  if (result.code !== 0) {
    throw new ToolUnavailableError(tool);
  }
  return result.stdout.trim();
}
