import * as path from "node:path";
import type { Http } from "./http.ts";
import type { Shell } from "./exec.ts";
import { PreconditionError } from "./errors.ts";
import { createReporter } from "./log.ts";

const log = createReporter("packages");

export async function isPackageInstalled(shell: Shell, pkg: string) {
    try {
        const status = await shell.exec("dpkg-query", ["-W", "-f=${Status}", pkg], { quiet: true });
        return status.trim() === "install ok installed";
    } catch {
        // dpkg-query exits non-zero for packages it has never heard of
        return false;
    }
}

export async function missingPackages(shell: Shell, pkgs: string[]) {
    const missing: string[] = [];
    for (const pkg of pkgs) {
        if (!await isPackageInstalled(shell, pkg)) missing.push(pkg);
    }
    return missing;
}

async function aptFrontend(shell: Shell) {
    if (await shell.exists("apt")) return "apt";
    if (await shell.exists("apt-get")) return "apt-get";
    throw new PreconditionError("No supported package manager found (apt or apt-get)");
}

/** Always refreshes the index and installs, like `apt update && apt install -y`. */
export async function aptInstall(shell: Shell, pkgs: string[]) {
    if (!pkgs.length) return;

    const apt = await aptFrontend(shell);
    await shell.exec(apt, ["update"], { sudo: true });
    await shell.exec(apt, ["install", "-y", ...pkgs], { sudo: true });
}

/** Maps commands to the package that provides them; installs packages for the absent ones. */
export async function ensureCommands(shell: Shell, commands: Record<string, string>) {
    const pkgs: string[] = [];
    for (const [command, pkg] of Object.entries(commands)) {
        if (!await shell.exists(command) && !pkgs.includes(pkg)) pkgs.push(pkg);
    }

    if (pkgs.length) {
        log.step(`Installing required dependencies: ${pkgs.join(" ")}`);
        await aptInstall(shell, pkgs);
    }
    return pkgs;
}

export async function snapInstall(shell: Shell, name: string, { classic = false } = {}) {
    await shell.exec("snap", ["install", name, ...(classic ? ["--classic"] : [])], { sudo: true });
}

export interface AptSource {
    /** Becomes /etc/apt/sources.list.d/<name>.list */
    name: string;
    keyUrl: string;
    keyring: string;
    line: string;
    /** ASCII-armored keys go through `gpg --dearmor` first. */
    dearmor?: boolean;
}

export async function addAptSource(shell: Shell, http: Http, source: AptSource) {
    const key = await http.bytes(source.keyUrl);
    await shell.exec("mkdir", ["-p", path.dirname(source.keyring)], { sudo: true });

    if (source.dearmor) {
        await shell.exec("gpg", ["--dearmor", "--yes", "-o", source.keyring], { sudo: true, input: key });
    } else {
        await shell.exec("tee", [source.keyring], { sudo: true, input: key, quiet: true });
    }

    await shell.exec("tee", [`/etc/apt/sources.list.d/${source.name}.list`], {
        sudo: true,
        input: `${source.line}\n`,
        quiet: true,
    });
}
