import { execFile } from 'node:child_process';

export interface CommandRequest {
    /** Command line handed to `shell -c` */
    command: string;
    /** Written to the child's stdin, which is then closed. Null leaves stdin empty. */
    input: string | null;
    cwd?: string;
    env?: Record<string, string>;
    timeoutMs: number;
    shell: string;
}

export interface CommandResult {
    exitCode: number | null;
    signal: string | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    durationMs: number;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Command Runner — runs one external command through the shell
 *
 * Resolves for every outcome the child can produce (including non-zero
 * exit and timeout); rejects only when the process cannot be started.
 */
export function runCommand(request: CommandRequest): Promise<CommandResult> {
    const start = Date.now();

    return new Promise((resolve, reject) => {
        const child = execFile(
            request.shell,
            ['-c', request.command],
            {
                cwd: request.cwd,
                timeout: request.timeoutMs,
                maxBuffer: MAX_BUFFER,
                encoding: 'utf-8',
                env: { ...process.env, ...request.env },
            },
            (err, stdout, stderr) => {
                const durationMs = Date.now() - start;
                if (!err) {
                    resolve({ exitCode: 0, signal: null, stdout, stderr, timedOut: false, durationMs });
                    return;
                }

                if (typeof err.code === 'string') {
                    // spawn failure (ENOENT, EACCES …) or maxBuffer overflow
                    reject(err);
                    return;
                }

                resolve({
                    exitCode: typeof err.code === 'number' ? err.code : null,
                    signal: err.signal ?? null,
                    stdout,
                    stderr,
                    timedOut: err.killed === true && err.signal === 'SIGTERM',
                    durationMs,
                });
            }
        );

        if (child.stdin) {
            // the child may exit without reading its input
            child.stdin.on('error', () => undefined);
            if (request.input !== null) {
                child.stdin.end(request.input);
            } else {
                child.stdin.end();
            }
        }
    });
}
