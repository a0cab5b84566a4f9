import { appendFileSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { createReporter } from "../system/log.ts";

const log = createReporter("shell-rc");

/** zsh users get ~/.zshrc, everyone else ~/.bashrc. The file is created when missing. */
export function resolveShellConfig(shell: string, home: string) {
    const file = path.join(home, shell.endsWith("/zsh") ? ".zshrc" : ".bashrc");
    if (!existsSync(file)) writeFileSync(file, "");
    return file;
}

/** Appends `block` unless `marker` already occurs in the file. */
export function appendBlock(file: string, marker: string, block: string) {
    const current = existsSync(file) ? readFileSync(file, "utf8") : "";

    if (current.includes(marker)) {
        log.note(`${marker} already present in ${file}. No changes needed.`);
        return false;
    }

    appendFileSync(file, `\n${block.trimEnd()}\n`);
    log.ok(`Added ${marker} to ${file}`);
    return true;
}

export function isOnPath(dir: string, envPath: string) {
    const wanted = path.resolve(dir);
    return envPath.split(":").filter(Boolean).some((entry) => path.resolve(entry) === wanted);
}
