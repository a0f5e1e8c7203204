import { spawn } from "child_process";
import { once } from "events";
import { ResourceLoadError } from "../utils/errors";

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  onStdout?: (text: string) => void;
}

/**
 * Spawns `bin` without a shell and waits for it to exit. Rejects when the
 * process cannot be started at all.
 */
export const runCommand = async (
  bin: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> => {
  const child = spawn(bin, args, {
    stdio: ["ignore", "pipe", "pipe"],
    shell: false,
  });

  let stdoutData = "";
  let stderrData = "";

  child.stdout.on("data", (data: Buffer) => {
    const text = data.toString("utf8");
    stdoutData += text;
    options.onStdout?.(text);
  });

  child.stderr.on("data", (data: Buffer) => {
    stderrData += data.toString("utf8");
  });

  // "close" fires after stdout and stderr have drained, unlike "exit"
  const [exitCode] = (await once(child, "close")) as [
    number | null,
    NodeJS.Signals | null,
  ];

  return { exitCode, stdout: stdoutData, stderr: stderrData };
};

/**
 * Checks that an external tool starts and exits cleanly with `probeArgs`.
 */
export const ensureCommand = async (
  label: string,
  bin: string,
  probeArgs: string[]
): Promise<void> => {
  let result: CommandResult;
  try {
    result = await runCommand(bin, probeArgs);
  } catch (error) {
    throw new ResourceLoadError(`${label} could not be started (${bin}).`, {
      cause: error,
    });
  }

  if (result.exitCode !== 0) {
    throw new ResourceLoadError(
      `${label} exited with code ${result.exitCode} while probing (${bin}).\n${result.stderr}`
    );
  }
};
