import { mkdirSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import type { Shell } from "../system/exec.ts";
import { createReporter } from "../system/log.ts";

const log = createReporter("mime");

export interface MimeTypeDefinition {
    type: string;
    comments: { text: string; lang?: string }[];
    globs: string[];
    magic?: { value: string; type: "string" | "byte"; offset: number; priority: number }[];
    icon?: string;
}

const escapeXml = (value: string) => value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

export function renderMimePackage(definitions: MimeTypeDefinition[]) {
    const lines = [
        `<?xml version="1.0"?>`,
        `<mime-info xmlns="http://www.freedesktop.org/standards/shared-mime-info">`,
    ];

    for (const def of definitions) {
        lines.push(`    <mime-type type="${escapeXml(def.type)}">`);

        for (const comment of def.comments) {
            const lang = comment.lang ? ` xml:lang="${escapeXml(comment.lang)}"` : "";
            lines.push(`        <comment${lang}>${escapeXml(comment.text)}</comment>`);
        }

        for (const glob of def.globs) {
            lines.push(`        <glob pattern="${escapeXml(glob)}"/>`);
        }

        for (const magic of def.magic ?? []) {
            lines.push(
                `        <magic priority="${magic.priority}">`,
                `            <match value="${escapeXml(magic.value)}" type="${magic.type}" offset="${magic.offset}"/>`,
                `        </magic>`,
            );
        }

        if (def.icon) lines.push(`        <icon name="${escapeXml(def.icon)}"/>`);

        lines.push(`    </mime-type>`);
    }

    lines.push(`</mime-info>`);
    return `${lines.join("\n")}\n`;
}

export async function installMimePackage(ctx: SetupContext, name: string, definitions: MimeTypeDefinition[]) {
    const mimeDir = ctx.config.paths.mimeDir;
    const packagesDir = path.join(mimeDir, "packages");
    const file = path.join(packagesDir, `${name}.xml`);

    log.step(`Registering MIME types: ${definitions.map((d) => d.type).join(", ")}`);
    mkdirSync(packagesDir, { recursive: true });
    writeFileSync(file, renderMimePackage(definitions));

    log.step("Updating MIME database...");
    await ctx.shell.exec("update-mime-database", [mimeDir]);
    return file;
}

export async function setDefaultApplication(shell: Shell, desktopFile: string, mimeTypes: string[]) {
    for (const mimeType of mimeTypes) {
        await shell.exec("xdg-mime", ["default", desktopFile, mimeType]);
    }
}

export async function queryDefault(shell: Shell, mimeType: string) {
    return shell.exec("xdg-mime", ["query", "default", mimeType], { quiet: true });
}
