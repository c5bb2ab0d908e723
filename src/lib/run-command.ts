import { spawn } from 'node:child_process';

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  spawnError: string | null;
};

export type RunCommandOptions = {
  cwd: string;
  stdin?: string | null;
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Spawns a command and collects its output. Never rejects: spawn failures, timeouts and aborts are
 * reported through `spawnError`. A timed out or aborted child gets SIGTERM, then SIGKILL.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], cwd: options.cwd });
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | null = null;

    let stdout = '';
    let stderr = '';
    const stop = (reason: string): void => {
      child.kill('SIGTERM');
      setTimeout(() => child.kill('SIGKILL'), 2000).unref();
      finish({ exitCode: null, stdout, stderr, spawnError: reason });
    };

    const onAbort = (): void => stop('Command aborted');

    const finish = (result: CommandResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      options.signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error: Error & { code?: string }) => {
      const message = error.code === 'ENOENT' ? `Command not found: ${command}` : error.message;
      finish({ exitCode: null, stdout, stderr, spawnError: message });
    });

    child.on('close', (code) => {
      finish({ exitCode: code, stdout, stderr, spawnError: null });
    });

    timeoutHandle = setTimeout(() => stop(`Command timed out after ${options.timeoutMs}ms`), options.timeoutMs);

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    child.stdin?.end(options.stdin ? `${options.stdin}\n` : undefined);
  });
}
