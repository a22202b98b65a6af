import { spawn } from "node:child_process";

/** Compiles a development checkout in place. */
export interface BuildTool {
  readonly command: readonly string[];
  /** Run the build in `repoPath` and resolve with its exit code. */
  run(repoPath: string): Promise<number>;
}

/**
 * Runs the configured build command with the terminal attached, so the
 * build's own progress output reaches the user.
 */
export class ProcessBuildTool implements BuildTool {
  constructor(readonly command: readonly string[]) {
    if (command.length === 0) {
      throw new Error("Build command must not be empty");
    }
  }

  run(repoPath: string): Promise<number> {
    const [program, ...args] = this.command;
    return new Promise((resolve, reject) => {
      const child = spawn(program, args, { cwd: repoPath, stdio: "inherit" });
      child.once("error", reject);
      child.once("close", (code, signal) => {
        resolve(code ?? (signal ? 128 : 1));
      });
    });
  }
}
