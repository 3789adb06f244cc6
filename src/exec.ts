import { spawn } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

export const spawnRunner: CommandRunner = (file, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(file, [...args], { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        // killed by a signal
        exitCode: code ?? 1,
      });
    });
  });

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(" ");
}
