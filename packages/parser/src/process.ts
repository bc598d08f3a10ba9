import { spawn } from "node:child_process";
import { TransientIOError } from "@docpipe/errors";

export interface ProcessOutput {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

/**
 * Spawn a converter, feed `input` on stdin and collect its output. Rejects
 * only when the process cannot be started or is aborted; a non-zero exit is
 * reported through `code` so each caller can classify it.
 */
export function runProcess(
  command: string,
  args: string[],
  input: Uint8Array,
  options: { signal?: AbortSignal; service: string },
): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: options.signal });

    const stdout: Buffer[] = [];
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout.push(data);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("close", (code) => {
      resolve({ code, stdout: Buffer.concat(stdout), stderr });
    });

    child.on("error", (err) => {
      reject(
        new TransientIOError(`Failed to run ${options.service}: ${err.message}`, options.service, {
          cause: err,
        }),
      );
    });

    // EPIPE when the child exits before reading stdin surfaces through "close"
    child.stdin.on("error", () => undefined);
    child.stdin.end(Buffer.from(input));
  });
}
