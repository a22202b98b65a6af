import { execFile, spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { JvmError } from "../errors.js";

const pExecFile = promisify(execFile);

// "javac 1.8.0_292" (major 8) or "javac 17.0.2"
const JAVAC_VERSION_PATTERN = /^javac (1\.(\d+)\.\S+|(\d+)(?:\.\S+)?)$/;

export const YOURKIT_AGENT_PATH = "/opt/yourkit/bin/linux-x86-64/libyjpagent.so";

/** G1 tuning for an allocation-heavy game server. */
export const JVM_FLAGS: readonly string[] = [
  "-XX:+UnlockExperimentalVMOptions",
  "-XX:+DisableExplicitGC",
  "-XX:+AlwaysPreTouch",
  "-XX:G1NewSizePercent=30",
  "-XX:G1MaxNewSizePercent=40",
  "-XX:G1HeapRegionSize=8M",
  "-XX:G1MixedGCLiveThresholdPercent=90",
  "-XX:MaxTenuringThreshold=1",
  "-XX:SurvivorRatio=32",
  "-XX:G1MixedGCCountTarget=4",
  "-XX:+PerfDisableSharedMem",
];

export type JvmInstall = {
  basePath: string;
  major: number;
  /** Full version name, e.g. `17.0.2`. */
  version: string;
};

/** Runs `javac -version` and resolves with whatever it printed. */
export type JavacVersionReader = (javacPath: string) => Promise<string>;

export const execJavac: JavacVersionReader = async (javacPath) => {
  const { stdout, stderr } = await pExecFile(javacPath, ["-version"], { encoding: "utf8" });
  // Java 8 reports on stderr
  return stdout.trim() || stderr.trim();
};

export function parseJavacVersion(output: string): { major: number; version: string } {
  const match = JAVAC_VERSION_PATTERN.exec(output.trim());
  if (!match) {
    throw new JvmError(`Unable to match javac version: ${JSON.stringify(output.trim())}`);
  }
  return { major: Number(match[2] ?? match[3]), version: match[1] };
}

export function javaBin(install: JvmInstall): string {
  return path.join(install.basePath, "bin", "java");
}

export async function detectJvm(basePath: string, readVersion: JavacVersionReader = execJavac): Promise<JvmInstall> {
  const javac = path.join(basePath, "bin", "javac");
  if (!fs.existsSync(javac)) {
    throw new JvmError(`Unable to find javac: ${javac}`);
  }
  const { major, version } = parseJavacVersion(await readVersion(javac));
  return { basePath, major, version };
}

/** Detect every JVM installed directly under `searchDir`. Symlinks and files are skipped. */
export async function detectAllJvms(searchDir: string, readVersion: JavacVersionReader = execJavac): Promise<JvmInstall[]> {
  if (!fs.existsSync(searchDir)) {
    throw new JvmError(`Unable to search for JVMs in ${searchDir}`);
  }
  const installs: JvmInstall[] = [];
  const entries = await fs.promises.readdir(searchDir, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;
    installs.push(await detectJvm(path.join(searchDir, entry.name), readVersion));
  }
  if (installs.length === 0) {
    throw new JvmError(`Didn't find any JVMs in ${searchDir}`);
  }
  return installs;
}

/** The newest install, optionally restricted to one major version. */
export function selectJvm(installs: readonly JvmInstall[], requestedMajor?: number): JvmInstall {
  const candidates =
    requestedMajor === undefined ? installs : installs.filter((i) => i.major === requestedMajor);
  let best: JvmInstall | null = null;
  for (const install of candidates) {
    if (!best || install.major > best.major) best = install;
  }
  if (!best) {
    throw new JvmError(
      requestedMajor === undefined ? "Unable to find any JVMs" : `Unknown JVM version: ${requestedMajor}`,
    );
  }
  return best;
}

export type JavaArgsOptions = {
  memory: string;
  artifactPath: string;
  /** Attach the YourKit profiling agent. */
  yourkit?: boolean;
  yourkitAgentPath?: string;
};

export function buildJavaArgs(options: JavaArgsOptions): string[] {
  const args = [`-Xms${options.memory}`, `-Xmx${options.memory}`];
  if (options.yourkit) {
    const agent = options.yourkitAgentPath ?? YOURKIT_AGENT_PATH;
    if (!fs.existsSync(agent)) {
      throw new JvmError(`Missing yourkit profiler: ${agent}`);
    }
    args.push(`-agentpath:${agent}=exceptions=disable,delay=10000`);
  }
  args.push(...JVM_FLAGS, "-jar", options.artifactPath, "--nogui");
  return args;
}

/** Run the server in the foreground and resolve with its exit code. */
export function launchServer(install: JvmInstall, args: readonly string[], serverDir: string): Promise<number> {
  fs.mkdirSync(serverDir, { recursive: true });
  return new Promise((resolve, reject) => {
    const child = spawn(javaBin(install), [...args], { cwd: serverDir, stdio: "inherit" });
    child.once("error", reject);
    child.once("close", (code, signal) => resolve(code ?? (signal ? 128 : 1)));
  });
}
