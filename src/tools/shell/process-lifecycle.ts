import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { Readable } from "node:stream";

import type { AbortSignalLike } from "../../types/tool";

import { describeError } from "../../utils/errors";
import { log } from "../../utils/logger";

type ProcessSignal = Exclude<Parameters<typeof process.kill>[1], number | undefined>;

export interface SpawnedCommandResult {
  aborted: boolean;
  durationMs: number;
  exitCode: null | number;
  lifecycleEvent: "abort" | "none" | "timeout";
  signal: null | ProcessSignal;
  stderr: string;
  stdout: string;
  timedOut: boolean;
}

function getShellInvocation(command: string): { args: string[]; executable: string } {
  if (process.platform === "win32") {
    return {
      args: ["-NoLogo", "-NoProfile", "-NonInteractive", "-Command", command],
      executable: "powershell.exe",
    };
  }

  return {
    args: ["-c", command],
    executable: "sh",
  };
}

function collectStreamOutput(stream: Readable): Promise<string> {
  return new Promise((resolveOutput, rejectOutput) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk) => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    });
    stream.on("error", rejectOutput);
    stream.on("end", () => {
      resolveOutput(Buffer.concat(chunks).toString("utf8"));
    });
  });
}

function killProcessTree(pid: number, signal: ProcessSignal): void {
  if (pid <= 0 || !Number.isFinite(pid)) {
    return;
  }

  if (process.platform !== "win32") {
    try {
      process.kill(-pid, signal);
      return;
    } catch (error) {
      log(`Process group kill failed for ${pid}, killing the process directly: ${describeError(error)}`);
    }
  }

  try {
    process.kill(pid, signal);
  } catch (error) {
    log(`Process ${pid} already exited: ${describeError(error)}`);
  }
}

export async function runSpawnedCommand(input: {
  abortSignal?: AbortSignalLike;
  args: string[];
  executable: string;
  timeoutMs: number;
  workingDirectory?: string;
}): Promise<SpawnedCommandResult> {
  const processHandle: ChildProcessWithoutNullStreams = spawn(input.executable, input.args, {
    cwd: input.workingDirectory ?? process.cwd(),
    detached: process.platform !== "win32",
    env: process.env,
    stdio: "pipe",
    windowsHide: true,
  });

  const startedAt = Date.now();
  const stdoutPromise = collectStreamOutput(processHandle.stdout);
  const stderrPromise = collectStreamOutput(processHandle.stderr);

  let lifecycleEvent: SpawnedCommandResult["lifecycleEvent"] = "none";
  let aborted = false;
  let terminationRequested = false;
  let timedOut = false;
  let forceKillTimeoutId: ReturnType<typeof setTimeout> | undefined;
  const terminateProcessTree = (event: "abort" | "timeout"): void => {
    if (terminationRequested) {
      return;
    }
    terminationRequested = true;
    lifecycleEvent = event;
    aborted = event === "abort";
    timedOut = event === "timeout";
    const pid = processHandle.pid ?? 0;

    killProcessTree(pid, "SIGTERM");
    forceKillTimeoutId = setTimeout(() => {
      killProcessTree(pid, "SIGKILL");
    }, 1_000);
  };

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  if (input.timeoutMs > 0) {
    timeoutId = setTimeout(() => {
      terminateProcessTree("timeout");
    }, input.timeoutMs);
  }

  const abortListener = (): void => {
    terminateProcessTree("abort");
  };
  if (input.abortSignal) {
    if (input.abortSignal.aborted) {
      abortListener();
    } else {
      input.abortSignal.addEventListener("abort", abortListener, { once: true });
    }
  }

  const exitInfo = await new Promise<{ exitCode: null | number; signal: null | ProcessSignal }>(
    (resolveExit, rejectExit) => {
      processHandle.once("error", (error) => {
        rejectExit(error);
      });
      processHandle.once("close", (exitCode, signal) => {
        resolveExit({
          exitCode,
          signal,
        });
      });
    }
  ).finally(() => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (forceKillTimeoutId) {
      clearTimeout(forceKillTimeoutId);
    }
    if (input.abortSignal) {
      input.abortSignal.removeEventListener("abort", abortListener);
    }
  });

  const [stdout, stderr] = await Promise.all([stdoutPromise, stderrPromise]);

  return {
    aborted,
    durationMs: Math.max(0, Date.now() - startedAt),
    exitCode: exitInfo.exitCode,
    lifecycleEvent,
    signal: exitInfo.signal,
    stderr,
    stdout,
    timedOut,
  };
}

export function runSpawnedShellCommand(input: {
  abortSignal?: AbortSignalLike;
  command: string;
  timeoutMs: number;
  workingDirectory?: string;
}): Promise<SpawnedCommandResult> {
  const { args, executable } = getShellInvocation(input.command);
  return runSpawnedCommand({
    abortSignal: input.abortSignal,
    args,
    executable,
    timeoutMs: input.timeoutMs,
    workingDirectory: input.workingDirectory,
  });
}

export type { ProcessSignal };
