/**
 * Render orchestrator
 *
 * Feeds a script to the renderer process on stdin and copies its stdout
 * into the destination file while stderr is read line by line. Both
 * streams are drained concurrently.
 */

import { spawn, type ChildProcess } from "child_process";
import { open, rm, writeFile, type FileHandle } from "fs/promises";
import { createInterface } from "readline";
import { pipeline } from "stream/promises";
import { consoleLogger, type Logger } from "../logger.js";

export const DEFAULT_RENDER_COMMAND = "gnuplot";

export interface RenderOptions {
  /** Renderer executable, looked up on PATH (default: gnuplot) */
  command?: string;
  args?: string[];
  /** Also write renderer diagnostics to this file */
  logFile?: string;
  signal?: AbortSignal;
  log?: Logger;
}

export interface RenderResult {
  destination: string;
  exitCode: number | null;
  /** Signal that ended the renderer, if any */
  exitSignal: NodeJS.Signals | null;
  bytesWritten: number;
  diagnostics: string[];
  /** The renderer closed its output itself rather than being killed by a signal */
  complete: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function waitForSpawn(child: ChildProcess, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", (error) => reject(new Error(`Could not start renderer '${command}': ${error.message}`, { cause: error })));
  });
}

function waitForClose(child: ChildProcess): Promise<{ code: number | null; signal: NodeJS.Signals | null }> {
  return new Promise((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
  });
}

/**
 * Render a script into the destination file
 */
export async function renderScript(script: string, destination: string, options: RenderOptions = {}): Promise<RenderResult> {
  const { command = DEFAULT_RENDER_COMMAND, args = [], logFile, signal, log = consoleLogger } = options;

  if (signal?.aborted) {
    throw new Error("Render aborted before start");
  }

  let handle: FileHandle;
  try {
    handle = await open(destination, "w");
  } catch (error) {
    throw new Error(`Could not open output file '${destination}': ${errorMessage(error)}`, { cause: error });
  }
  const output = handle.createWriteStream();

  if (signal?.aborted) {
    output.destroy();
    await rm(destination, { force: true });
    throw new Error("Render aborted");
  }

  const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
  try {
    await waitForSpawn(child, command);
  } catch (error) {
    output.destroy();
    await rm(destination, { force: true });
    throw error;
  }

  const { stdin, stdout, stderr } = child;
  if (!stdin || !stdout || !stderr) {
    child.kill();
    output.destroy();
    await rm(destination, { force: true });
    throw new Error(`Renderer '${command}' started without piped stdio`);
  }

  const diagnostics: string[] = [];
  const closed = waitForClose(child);

  const drainDiagnostics = async (): Promise<void> => {
    const lines = createInterface({ input: stderr, crlfDelay: Infinity });
    for await (const line of lines) {
      if (line.trim() === "") continue;
      diagnostics.push(line);
      log.warn(`Renderer: ${line}`);
    }
  };

  // The renderer may exit before reading all of its input
  stdin.on("error", (error) => {
    diagnostics.push(`stdin: ${error.message}`);
  });
  stdin.end(script);

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => {
      child.kill();
      reject(new Error("Render aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    // Aborted while the renderer was starting
    if (signal?.aborted) onAbort();
  });

  let exit: { code: number | null; signal: NodeJS.Signals | null };
  try {
    const [, , result] = await Promise.race([
      Promise.all([pipeline(stdout, output), drainDiagnostics(), closed]),
      aborted,
    ]);
    exit = result;
  } catch (error) {
    child.kill();
    output.destroy();
    await rm(destination, { force: true });
    throw error;
  } finally {
    if (onAbort) signal?.removeEventListener("abort", onAbort);
  }

  if (exit.code !== 0) {
    log.warn(
      exit.signal
        ? `Renderer ended by ${exit.signal}; output may be incomplete`
        : `Renderer exited with status ${exit.code}; output may be incomplete`
    );
  }

  if (logFile) {
    try {
      await writeFile(logFile, diagnostics.length > 0 ? diagnostics.join("\n") + "\n" : "");
    } catch (error) {
      log.warn(`Could not write renderer log '${logFile}': ${errorMessage(error)}`);
    }
  }

  return {
    destination,
    exitCode: exit.code,
    exitSignal: exit.signal,
    bytesWritten: output.bytesWritten,
    diagnostics,
    complete: exit.signal === null,
  };
}
