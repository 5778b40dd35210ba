import { spawn } from 'node:child_process';

export type ProcessResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  spawnError?: NodeJS.ErrnoException;
};

export type RunProcessOptions = {
  timeoutMs: number;
  maxOutputChars: number;
  input?: string;
  cwd?: string;
};

const KILL_GRACE_MS = 1500;

/**
 * Spawn a command without a shell and collect its output. On timeout the
 * child is killed and the result resolves only once it has closed.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      shell: false,
      cwd: options.cwd,
      env: process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let done = false;
    let timedOut = false;

    const trimToLimit = (text: string): string => {
      if (text.length <= options.maxOutputChars) return text;
      return text.slice(text.length - options.maxOutputChars);
    };

    const finish = (exitCode: number | null, spawnError?: NodeJS.ErrnoException) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: trimToLimit(stdout),
        stderr: trimToLimit(stderr),
        timedOut,
        ...(spawnError ? { spawnError } : {}),
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
      setTimeout(() => finish(null), KILL_GRACE_MS).unref();
    }, options.timeoutMs);

    // Decode across chunk boundaries; a multi-byte character may arrive split.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: Buffer | string) => {
      stdout += chunk.toString();
      if (stdout.length > options.maxOutputChars * 2) {
        stdout = stdout.slice(stdout.length - options.maxOutputChars * 2);
      }
    });

    child.stderr.on('data', (chunk: Buffer | string) => {
      stderr += chunk.toString();
      if (stderr.length > options.maxOutputChars * 2) {
        stderr = stderr.slice(stderr.length - options.maxOutputChars * 2);
      }
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish(null, error);
    });

    child.on('close', (code: number | null) => {
      finish(code);
    });

    if (options.input !== undefined) {
      // EPIPE: the child exited before reading its input; the exit code reports it.
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') {
          stderr += error.message;
        }
      });
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
}
