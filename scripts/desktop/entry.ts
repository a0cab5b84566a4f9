import { chmodSync, mkdirSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import { createReporter } from "../system/log.ts";

const log = createReporter("desktop-entry");

export interface DesktopEntry {
    version?: string;
    type?: "Application" | "Link" | "Directory";
    name: string;
    comment?: string;
    exec: string;
    icon?: string;
    terminal?: boolean;
    categories?: string[];
    startupWMClass?: string;
    mimeTypes?: string[];
    keywords?: string[];
    /** `X-` keys, written last in insertion order. */
    extra?: Record<`X-${string}`, string | boolean>;
}

const list = (values: string[]) => `${values.join(";")};`;

export function renderDesktopEntry(entry: DesktopEntry) {
    const fields: [string, string | boolean | string[] | undefined][] = [
        ["Version", entry.version],
        ["Type", entry.type ?? "Application"],
        ["Name", entry.name],
        ["Comment", entry.comment],
        ["Exec", entry.exec],
        ["Icon", entry.icon],
        ["Terminal", entry.terminal ?? false],
        ["Categories", entry.categories],
        ["StartupWMClass", entry.startupWMClass],
        ["MimeType", entry.mimeTypes],
        ["Keywords", entry.keywords],
        ...Object.entries(entry.extra ?? {}),
    ];

    const lines = ["[Desktop Entry]"];
    for (const [key, value] of fields) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
            if (value.length) lines.push(`${key}=${list(value)}`);
        } else {
            lines.push(`${key}=${value}`);
        }
    }

    return `${lines.join("\n")}\n`;
}

export async function updateDesktopDatabase(ctx: SetupContext, { bestEffort = false } = {}) {
    const dir = ctx.config.paths.applicationsDir;
    if (!await ctx.shell.exists("update-desktop-database")) return;

    try {
        await ctx.shell.exec("update-desktop-database", [dir]);
    } catch (err) {
        if (!bestEffort) throw err;
        log.warn(`update-desktop-database failed for ${dir}`);
    }
}

/** Writes `<applicationsDir>/<fileName>` as an executable launcher and refreshes the menu cache. */
export async function installDesktopEntry(
    ctx: SetupContext,
    fileName: string,
    entry: DesktopEntry,
    { bestEffort = false } = {},
) {
    const dir = ctx.config.paths.applicationsDir;
    const file = path.join(dir, fileName);

    log.step("Creating desktop shortcut...");
    mkdirSync(dir, { recursive: true });
    writeFileSync(file, renderDesktopEntry(entry));
    chmodSync(file, 0o755);

    await updateDesktopDatabase(ctx, { bestEffort });
    log.ok(`Desktop entry created at ${file}`);
    return file;
}
