import { copyFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import type { Shell } from "../system/exec.ts";
import { withTempDir } from "../system/tempDir.ts";
import { createReporter } from "../system/log.ts";

const log = createReporter("icons");

export function isSvg(content: string) {
    const firstLine = content.split("\n", 1)[0] ?? "";
    return firstLine.includes("<?xml") || firstLine.includes("<svg");
}

export interface PlaceholderIcon {
    lines: string[];
    background: string;
    foreground: string;
    /** Inner square colour; draws a rounded badge with a frame. */
    frame?: string;
}

export function renderPlaceholderIcon({ lines, background, foreground, frame }: PlaceholderIcon) {
    const parts = [`<svg width="256" height="256" xmlns="http://www.w3.org/2000/svg">`];

    if (frame) {
        parts.push(
            `  <rect width="256" height="256" rx="32" fill="${background}"/>`,
            `  <rect x="32" y="32" width="192" height="192" rx="16" fill="${frame}"/>`,
        );
    } else {
        parts.push(`  <rect width="256" height="256" fill="${background}"/>`);
    }

    lines.forEach((line, i) => {
        const y = 130 + (i - (lines.length - 1) / 2) * 40;
        parts.push(
            `  <text x="128" y="${y}" text-anchor="middle" dy=".3em" fill="${foreground}" font-family="Arial, sans-serif" font-size="32" font-weight="bold">${line}</text>`,
        );
    });

    parts.push(`</svg>`);
    return `${parts.join("\n")}\n`;
}

export function findFirstExisting(candidates: string[]) {
    return candidates.find((candidate) => existsSync(candidate));
}

export async function updateIconCache(shell: Shell, dir: string, { sudo = false } = {}) {
    if (!await shell.exists("gtk-update-icon-cache")) return;

    try {
        await shell.exec("gtk-update-icon-cache", ["-f", "-t", dir], { sudo, quiet: true });
    } catch {
        log.warn(`gtk-update-icon-cache could not refresh ${dir}`);
    }
}

export function clearIconCaches(cacheDir: string, { thumbnails = false } = {}) {
    log.step("Updating icon cache...");
    rmSync(path.join(cacheDir, "icon-cache.kcache"), { recursive: true, force: true });
    if (thumbnails) rmSync(path.join(cacheDir, "thumbnails"), { recursive: true, force: true });
}

/**
 * Installs `names[0]` at 48, 128 and 256 px under the user's hicolor theme;
 * the other names are copies, for MIME icons that shadow the first.
 */
export async function installMimeTypeIcons(ctx: SetupContext, iconFile: string, names: string[]) {
    if (!await ctx.shell.exists("convert")) {
        log.warn("Skipping MIME type icon setup (ImageMagick not available)");
        return false;
    }

    const hicolor = path.join(ctx.config.paths.iconsDir, "hicolor");
    log.step(`Setting up MIME type icons: ${names.join(", ")}`);

    for (const size of [48, 128, 256]) {
        const dir = path.join(hicolor, `${size}x${size}`, "mimetypes");
        mkdirSync(dir, { recursive: true });

        const [primary, ...aliases] = names.map((name) => path.join(dir, `${name}.png`));
        if (!primary) continue;

        if (size === 256) {
            copyFileSync(iconFile, primary);
        } else {
            await ctx.shell.exec("convert", [iconFile, "-resize", `${size}x${size}`, primary]);
        }

        for (const alias of aliases) copyFileSync(primary, alias);
    }

    await updateIconCache(ctx.shell, hicolor);
    return true;
}

const THEME_SIZES = [16, 24, 32, 48, 256];

async function renderPng(shell: Shell, svgFile: string, out: string, size: number) {
    if (await shell.exists("inkscape")) {
        await shell.exec("inkscape", [
            svgFile,
            "--export-type=png",
            `--export-filename=${out}`,
            `--export-width=${size}`,
            `--export-height=${size}`,
            "--export-background-opacity=0",
        ], { quiet: true });
    } else {
        await shell.exec("convert", [svgFile, "-background", "transparent", "-resize", `${size}x${size}`, out]);
    }
}

/** Overwrites an installed theme's MIME icon at every size it ships. Needs root. */
export async function replaceThemeMimeIcons(ctx: SetupContext, svgFile: string, themeDir: string, iconName: string) {
    const { shell } = ctx;

    if (!await shell.exists("inkscape") && !await shell.exists("convert")) {
        log.warn("Skipping system icon replacement (no image conversion tools available)");
        return 0;
    }

    const targets = THEME_SIZES.flatMap((size) => [
        { dir: `${size}x${size}`, pixels: size },
        { dir: `${size}x${size}@2x`, pixels: size * 2 },
    ])
        .map(({ dir, pixels }) => ({ file: path.join(themeDir, dir, "mimetypes", `${iconName}.png`), pixels }))
        .filter(({ file }) => existsSync(file));

    if (!targets.length) {
        log.note(`No ${iconName} icons found in ${themeDir} to replace.`);
        return 0;
    }

    await withTempDir("desk-setup-icons", async (tmp) => {
        for (const { file, pixels } of targets) {
            const rendered = path.join(tmp, `${iconName}-${pixels}.png`);
            await renderPng(shell, svgFile, rendered, pixels);
            await shell.exec("install", ["-m", "644", rendered, file], { sudo: true });
        }
    });

    await updateIconCache(shell, themeDir, { sudo: true });
    log.ok(`Replaced ${targets.length} ${iconName} icons in ${themeDir}`);
    return targets.length;
}

export async function restartFileManager(shell: Shell) {
    if (!await shell.exists("nautilus")) return;

    await shell.succeeds("nautilus", ["-q"]);
    shell.spawnDetached("nautilus");
}
