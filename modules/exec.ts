import { spawn } from 'child_process';
import { logger } from '@modules/logger.js';
import { redactSecrets } from '@common/strings.js';

export interface ExecResult {
  success: boolean;
  stdout?: string;
  stderr?: string;
  error?: string;
  exitCode?: number | null;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  //NOTE: Values scrubbed from stdout, stderr and error text before they leave this module
  secrets?: ReadonlyArray<string | undefined>;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

//NOTE: Arguments are passed as an array to spawn (no shell), so nothing is re-parsed
export function execFileCommand(
  file: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const secrets = options.secrets ?? [];
  const scrub = (text: string): string => redactSecrets(text, secrets);

  logger.debug('Executing command', { file, args: args.map(scrub), cwd: options.cwd });

  return new Promise((resolve) => {
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    child.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
    child.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    child.on('close', (code) => {
      clearTimeout(timer);
      if (code === 0 && !timedOut) {
        resolve({ success: true, stdout: scrub(stdout), stderr: scrub(stderr), exitCode: code });
        return;
      }
      const reason = timedOut
        ? `${file} timed out`
        : `${[file, ...args.slice(0, 1)].map(scrub).join(' ')} exited with code ${code}`;
      const detail = scrub(stderr.trim() || stdout.trim());
      resolve({
        success: false,
        stdout: scrub(stdout),
        stderr: scrub(stderr),
        error: detail ? `${reason}: ${detail}` : reason,
        exitCode: code,
      });
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      resolve({ success: false, error: scrub(`${file} error: ${err.message}`), exitCode: null });
    });
  });
}
