import { spawn } from 'node:child_process';

interface RunCommandOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

const formatCommand = (command: string, args: string[]): string =>
  [command, ...args].join(' ');

export const runCommand = (
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let timeoutHandle: NodeJS.Timeout | undefined;
    let settled = false;

    const settle = (callback: () => void): void => {
      if (settled) {
        return;
      }

      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      callback();
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        settle(() =>
          reject(
            new Error(`Command timed out after ${options.timeoutMs}ms: ${formatCommand(command, args)}`)
          )
        );
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      settle(() => reject(error));
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        settle(() =>
          reject(new Error(`Command failed (${code}): ${formatCommand(command, args)}${suffix}`))
        );
        return;
      }

      settle(() => resolve({ stdout, stderr }));
    });
  });
