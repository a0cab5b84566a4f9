import { readdirSync } from "node:fs";
import * as path from "node:path";
import AdmZip from "adm-zip";
import type { Shell } from "./exec.ts";

export function extractZip(file: string, dest: string) {
    new AdmZip(file).extractAllTo(dest, true);
}

/** tar picks the compression from the file itself. */
export async function extractTarball(shell: Shell, file: string, dest: string) {
    await shell.exec("tar", ["-xf", file, "-C", dest]);
}

export interface FoundFile {
    path: string;
    name: string;
    isDirectory: boolean;
}

/** Depth 1 means direct children only, like `find -maxdepth 1`. */
export function findFiles(dir: string, predicate: (file: FoundFile) => boolean, maxDepth = Infinity) {
    const found: string[] = [];

    const walk = (current: string, depth: number) => {
        for (const entry of readdirSync(current, { withFileTypes: true })) {
            const full = path.join(current, entry.name);
            const file = { path: full, name: entry.name, isDirectory: entry.isDirectory() };

            if (predicate(file)) found.push(full);
            if (file.isDirectory && depth < maxDepth) walk(full, depth + 1);
        }
    };

    walk(dir, 1);
    return found.sort();
}
