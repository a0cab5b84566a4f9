import type { Shell } from "../system/exec.ts";
import { createReporter } from "../system/log.ts";

const log = createReporter("dock");

const SCHEMA = "org.gnome.shell";
const KEY = "favorite-apps";

/** Reads gsettings' GVariant rendering of a string array: `@as []` or `['a.desktop', 'b.desktop']`. */
export function parseFavorites(output: string) {
    const text = output.trim();
    if (text === "@as []" || text === "[]" || text === "") return [];

    const body = text.replace(/^@as\s*/, "");
    return [...body.matchAll(/'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)"/g)]
        .map((m) => m[1] ?? m[2] ?? "")
        .filter(Boolean);
}

export function formatFavorites(favorites: string[]) {
    return `[${favorites.map((f) => `'${f.replace(/'/g, "\\'")}'`).join(", ")}]`;
}

export type PinResult = "pinned" | "already-pinned" | "unavailable";

export async function pinToDock(shell: Shell, desktopFile: string): Promise<PinResult> {
    if (!await shell.exists("gsettings")) {
        log.warn("gsettings not found, skipping dock pinning");
        return "unavailable";
    }

    log.step(`Pinning ${desktopFile} to dock...`);
    const favorites = parseFavorites(await shell.exec("gsettings", ["get", SCHEMA, KEY], { quiet: true }));

    if (favorites.includes(desktopFile)) {
        log.note(`${desktopFile} is already in the dock`);
        return "already-pinned";
    }

    await shell.exec("gsettings", ["set", SCHEMA, KEY, formatFavorites([...favorites, desktopFile])]);
    log.ok(`${desktopFile} added to dock`);
    return "pinned";
}
