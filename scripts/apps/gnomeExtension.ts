import { existsSync, mkdirSync, rmSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import { ConfigError, PreconditionError } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";
import { aptInstall } from "../system/packages.ts";
import { withTempDir } from "../system/tempDir.ts";
import { extractZip } from "../system/archive.ts";
import { fetchGnomeExtensionDownload, parseGnomeShellVersion } from "./releases.ts";

const log = createReporter("gnome-extension");

export interface GnomeExtensionOptions {
    uuid?: string;
    pk?: number;
}

/** The uuid names a directory under extensionsDir that gets replaced wholesale. */
export function isSafeUuid(uuid: string) {
    return uuid !== "" && uuid !== "." && uuid !== ".." && !/[/\\]/.test(uuid);
}

export async function installGnomeExtension(ctx: SetupContext, options: GnomeExtensionOptions = {}) {
    const { shell, http, config } = ctx;
    const uuid = options.uuid ?? config.gnomeExtension.uuid;
    const pk = options.pk ?? config.gnomeExtension.pk;
    if (!isSafeUuid(uuid)) throw new ConfigError(`Invalid extension uuid "${uuid}"`);
    const extensionDir = path.join(config.paths.extensionsDir, uuid);

    log.step(`Starting ${uuid} extension installation...`);

    if (!await shell.exists("gnome-shell")) {
        throw new PreconditionError("GNOME Shell is not installed. This extension requires GNOME Shell.");
    }

    const shellVersion = parseGnomeShellVersion(await shell.exec("gnome-shell", ["--version"], { quiet: true }));
    log.ok(`Detected GNOME Shell version: ${shellVersion ?? "unknown"}`);

    log.step("Installing required dependencies...");
    await aptInstall(shell, ["gnome-shell-extensions"]);

    mkdirSync(config.paths.extensionsDir, { recursive: true });

    log.step("Fetching extension metadata...");
    const downloadUrl = await fetchGnomeExtensionDownload(http, config.gnomeExtension.siteUrl, pk, shellVersion);

    await withTempDir("gnome-extension", async (workDir) => {
        log.step(`Downloading extension from: ${downloadUrl}`);
        const zip = path.join(workDir, "extension.zip");
        await http.download(downloadUrl, zip);

        if (existsSync(extensionDir)) {
            log.warn("Removing existing installation...");
            rmSync(extensionDir, { recursive: true, force: true });
        }

        log.step("Installing extension...");
        mkdirSync(extensionDir, { recursive: true });
        extractZip(zip, extensionDir);
    });

    if (!existsSync(path.join(extensionDir, "metadata.json"))) {
        throw new PreconditionError("Installation failed - metadata.json not found");
    }

    log.step("Enabling extension...");
    await shell.exec("gnome-extensions", ["enable", uuid]);

    log.ok(`${uuid} has been successfully installed!`);
    log.warn("You may need to restart GNOME Shell for the extension to take effect:");
    log.warn("  - Press Alt+F2, type 'r', and press Enter (X11)");
    log.warn("  - Or log out and log back in (Wayland)");

    return { uuid, extensionDir, shellVersion };
}
