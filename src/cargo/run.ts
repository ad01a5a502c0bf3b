import { spawn } from "node:child_process";
import { stat, utimes } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_TOOLCHAIN = "nightly";
export const DEFAULT_TOUCH_PATH = "src/main.rs";

export interface CargoOptions {
  toolchain?: string;
  cwd?: string;
}

export function buildCargoArgs(args: string[], options: CargoOptions = {}): string[] {
  const toolchain = options.toolchain ?? DEFAULT_TOOLCHAIN;
  return [`+${toolchain}`, "rustc", ...args, "--", "-Zprint-type-sizes"];
}

/** Updates the modification time so cargo re-runs rustc instead of reusing a cached build. */
export async function touchFile(filePath: string, now: Date = new Date()): Promise<void> {
  const resolved = path.resolve(filePath);
  let info;
  try {
    info = await stat(resolved);
  } catch {
    throw new Error(`Refusing to touch non-existing file: ${filePath}`);
  }
  if (!info.isFile()) {
    throw new Error(`Refusing to touch non-file path: ${filePath}`);
  }
  await utimes(resolved, now, now);
}

/** Resolves with the decoded stdout; chunks are joined before decoding so multi-byte characters survive splits. */
export function runCommand(command: string, args: string[], cwd?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));
    child.on("error", reject);

    child.on("close", (code) => {
      const stdout = Buffer.concat(stdoutChunks).toString("utf8");
      if (code === 0) {
        resolve(stdout);
        return;
      }

      const stderr = Buffer.concat(stderrChunks).toString("utf8");
      const output = [stdout.trim(), stderr.trim()].filter(Boolean).join("\n");
      reject(new Error(output || `${command} exited with code ${code}: ${args.join(" ")}`));
    });
  });
}

export async function runCargo(args: string[], options: CargoOptions = {}): Promise<string> {
  try {
    return await runCommand("cargo", buildCargoArgs(args, options), options.cwd);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`cargo rustc failed: ${message}`);
  }
}

export function commandExists(command: string): Promise<boolean> {
  return new Promise((resolve) => {
    const check = process.platform === "win32" ? "where" : "which";
    const child = spawn(check, [command], { stdio: "ignore" });
    child.on("error", () => resolve(false));
    child.on("close", (code) => resolve(code === 0));
  });
}
