import { chmodSync, existsSync, mkdirSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import { createReporter } from "../system/log.ts";
import { installDesktopEntry } from "../desktop/entry.ts";
import { installMimePackage, queryDefault, setDefaultApplication, type MimeTypeDefinition } from "../desktop/mime.ts";

const log = createReporter("cura");

const APP_NAME = "Ultimaker-Cura";
const DESKTOP_FILE = `${APP_NAME}.desktop`;

export const CURA_MIME_TYPES: MimeTypeDefinition[] = ["application/sla", "application/vnd.ms-pki.stl"].map((type) => ({
    type,
    comments: [{ text: "STL file" }],
    globs: ["*.stl"],
}));

export interface CuraOptions {
    appImageUrl?: string;
    iconUrl?: string;
}

export function curaPaths(ctx: SetupContext) {
    const { installRoot, iconsDir } = ctx.config.paths;
    return {
        appImage: path.join(installRoot, `${APP_NAME}.AppImage`),
        icon: path.join(iconsDir, "hicolor/256x256/apps", `${APP_NAME}.png`),
    };
}

export async function installCura(ctx: SetupContext, options: CuraOptions = {}) {
    const { shell, http, config } = ctx;
    const paths = curaPaths(ctx);
    const appImageUrl = options.appImageUrl ?? config.cura.appImageUrl;
    const iconUrl = options.iconUrl ?? config.cura.iconUrl;

    for (const dir of [config.paths.installRoot, config.paths.applicationsDir, path.dirname(paths.icon)]) {
        mkdirSync(dir, { recursive: true });
    }

    if (existsSync(paths.appImage)) {
        log.note("Cura AppImage already exists, skipping download.");
    } else {
        log.step("Downloading Cura AppImage...");
        await http.download(appImageUrl, paths.appImage);
        chmodSync(paths.appImage, 0o755);
    }

    if (existsSync(paths.icon)) {
        log.note("Cura icon already exists, skipping download.");
    } else {
        log.step("Downloading Cura icon...");
        await http.download(iconUrl, paths.icon);
    }

    await installDesktopEntry(ctx, DESKTOP_FILE, {
        name: "Ultimaker Cura",
        exec: `${paths.appImage} %U`,
        icon: paths.icon,
        terminal: false,
        mimeTypes: CURA_MIME_TYPES.map((m) => m.type),
        categories: ["Graphics", "3DPrinting"],
    });

    await installMimePackage(ctx, "ultimaker-cura", CURA_MIME_TYPES);

    log.step("Associating STL files with Cura...");
    const types = CURA_MIME_TYPES.map((m) => m.type);
    await setDefaultApplication(shell, DESKTOP_FILE, types);

    log.step("Verifying MIME type association...");
    const defaults: Record<string, string> = {};
    for (const type of types) {
        defaults[type] = await queryDefault(shell, type);
        log.info(`${type}: ${defaults[type] || "(none)"}`);
    }

    log.ok("Ultimaker Cura installation complete! You can now launch it from your application menu and open STL files directly with Cura.");
    return { appImage: paths.appImage, defaults };
}
