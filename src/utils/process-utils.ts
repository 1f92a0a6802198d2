import { execFile } from 'child_process';
import { promisify } from 'util';

export const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

// Shape of the error execFile rejects with
interface ExecFileFailure {
  message: string;
  code?: string | number | null;
  stdout?: string;
  stderr?: string;
}

/**
 * Run a binary with arguments (no shell) and capture its output
 * Never throws for a non-zero exit; a missing binary still rejects with ENOENT
 */
export async function runCommand(file: string, args: string[]): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, { maxBuffer: 16 * 1024 * 1024 });
    return { stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 };
  } catch (error) {
    const err = error as ExecFileFailure;
    if (err.code === 'ENOENT') {
      throw error;
    }
    return {
      stdout: (err.stdout ?? '').trim(),
      stderr: (err.stderr ?? err.message).trim(),
      exitCode: typeof err.code === 'number' ? err.code : 1,
    };
  }
}

