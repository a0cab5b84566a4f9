import { spawn } from "node:child_process";
import pc from "picocolors";
import { CommandError, PreconditionError } from "./errors.ts";
import { createReporter } from "./log.ts";

const log = createReporter("exec");

export interface ExecOptions {
    /** Written to the child's stdin, which is then closed. */
    input?: string | Uint8Array;
    /** Prefix with sudo unless we already are root. */
    sudo?: boolean;
    /** Capture output without echoing it. */
    quiet?: boolean;
    cwd?: string;
}

/**
 * Everything that leaves the process through a subprocess goes through here,
 * so installers can be exercised against a recording fake.
 */
export interface Shell {
    exec(cmd: string, args?: string[], options?: ExecOptions): Promise<string>;
    succeeds(cmd: string, args?: string[]): Promise<boolean>;
    exists(command: string): Promise<boolean>;
    isRoot(): boolean;
    spawnDetached(cmd: string, args?: string[]): void;
}

export async function execCmd(cmd: string, args: string[] = [], options: ExecOptions = {}) {
    const { input, quiet = false, cwd } = options;

    if (!quiet) console.log(pc.dim(`Running: ${cmd} ${args.join(" ")}`));
    log.debug("exec", { cmd, args, cwd });

    const child = spawn(cmd, args, { cwd });

    let fullOut = "";
    let fullErr = "";

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (chunk: string) => {
        fullOut += chunk;
        if (!quiet && chunk.trim()) process.stdout.write(chunk);
    });

    child.stderr.on("data", (chunk: string) => {
        fullErr += chunk;
        if (!quiet && chunk.trim()) process.stderr.write(pc.yellow(chunk));
    });

    // a child that exits without reading its input is reported by its exit code
    child.stdin.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE") log.debug("stdin write failed", { cmd, error: err.message });
    });
    child.stdin.end(input);

    const code = await new Promise<number | null>((resolve, reject) => {
        child.once("error", (err) => reject(new CommandError(cmd, args, null, err.message)));
        child.once("close", resolve);
    });

    if (code !== 0) {
        log.debug("exec failed", { cmd, args, code, stderr: fullErr });
        throw new CommandError(cmd, args, code, fullErr);
    }

    return fullOut.trim();
}

export function testCmd(cmd: string, args: string[] = []) {
    return new Promise<boolean>((resolve) => {
        const child = spawn(cmd, args, { stdio: "ignore" });
        child.once("error", () => resolve(false));
        child.once("close", (code) => resolve(code === 0));
    });
}

export function createSystemShell(): Shell {
    const isRoot = () => process.getuid?.() === 0;

    return {
        exec(cmd, args = [], options = {}) {
            if (options.sudo && !isRoot()) return execCmd("sudo", [cmd, ...args], options);
            return execCmd(cmd, args, options);
        },
        succeeds: testCmd,
        exists: (command) => testCmd("which", [command]),
        isRoot,
        spawnDetached(cmd, args = []) {
            const child = spawn(cmd, args, { detached: true, stdio: "ignore" });
            child.on("error", (err) => log.warn(`Could not start ${cmd}: ${err.message}`));
            child.unref();
        },
    };
}

export function requireRoot(shell: Shell) {
    if (!shell.isRoot()) throw new PreconditionError("This command must be run as root (use sudo)");
}
