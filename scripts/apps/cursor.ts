import { chmodSync, existsSync, mkdirSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import type { Shell } from "../system/exec.ts";
import { PreconditionError } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";
import { installDesktopEntry } from "../desktop/entry.ts";
import { pinToDock } from "../desktop/dock.ts";
import { clearIconCaches, restartFileManager } from "../desktop/icons.ts";
import { appendBlock, resolveShellConfig } from "../user/shellRc.ts";
import { fetchCursorRelease } from "./releases.ts";

const log = createReporter("cursor");

const DESKTOP_FILE = "cursor.desktop";

export function cursorPaths(ctx: SetupContext) {
    const installDir = path.join(ctx.config.paths.installRoot, "cursor");
    return {
        installDir,
        appImage: path.join(installDir, "cursor.AppImage"),
        icon: path.join(ctx.config.paths.iconsDir, "cursor.png"),
    };
}

/** Shell function that opens Cursor detached, on the cwd when called without arguments. */
export function cursorLauncherFunction(appImage: string) {
    return `# Cursor AI IDE launcher function
function cursor() {
    local args=""
    if [ $# -eq 0 ]; then
        args=$(pwd)
    else
        for arg in "$@"; do
            args="$args $arg"
        done
    fi
    local executable="${appImage}"
    (nohup $executable --no-sandbox "$args" >/dev/null 2>&1 &)
}`;
}

export async function getCurrentVersion(shell: Shell, appImage: string) {
    if (!existsSync(appImage)) return "not installed";

    try {
        const output = await shell.exec(appImage, ["--version"], { quiet: true });
        return output.match(/\d+\.\d+\.\d+/)?.[0] ?? "unknown";
    } catch {
        return "unknown";
    }
}

export async function installCursor(ctx: SetupContext, { force = false } = {}) {
    const { shell, http, config } = ctx;
    const paths = cursorPaths(ctx);

    log.step("Starting Cursor installation...");

    if (await shell.succeeds("pgrep", ["-f", "cursor.AppImage"])) {
        throw new PreconditionError("Cursor is currently running. Please close all instances of Cursor and try again.");
    }

    for (const dir of [paths.installDir, config.paths.applicationsDir, config.paths.iconsDir]) {
        mkdirSync(dir, { recursive: true });
    }

    const release = await fetchCursorRelease(http, config.cursor.apiUrl);
    const current = await getCurrentVersion(shell, paths.appImage);
    log.info(`Installed version: ${current}, latest: ${release.version}`);

    const upToDate = current === release.version && !force;
    if (upToDate) {
        log.ok(`Cursor ${release.version} is already installed, skipping download.`);
    } else {
        log.step(`Downloading Cursor version ${release.version}...`);
        await http.download(release.downloadUrl, paths.appImage);
        chmodSync(paths.appImage, 0o755);
    }

    log.step("Setting up icon...");
    if (existsSync(paths.icon)) {
        log.note("Cursor icon already exists, skipping download.");
    } else {
        await http.download(config.cursor.iconUrl, paths.icon);
    }

    await installDesktopEntry(ctx, DESKTOP_FILE, {
        version: "1.0",
        name: "Cursor",
        comment: "AI-first code editor",
        exec: `${paths.appImage} --no-sandbox %U`,
        icon: paths.icon,
        terminal: false,
        categories: ["Development", "TextEditor", "IDE"],
        startupWMClass: "Cursor",
        mimeTypes: ["text/plain", "inode/directory", "application/x-code-workspace"],
        extra: { "X-GNOME-SingleWindow": true },
    });

    const rcFile = resolveShellConfig(config.shell, config.home);
    if (appendBlock(rcFile, "function cursor()", cursorLauncherFunction(paths.appImage))) {
        log.note(`Please restart your terminal or run 'source ${rcFile}' to use the cursor command.`);
    }

    await pinToDock(shell, DESKTOP_FILE);
    clearIconCaches(config.paths.cacheDir);
    await restartFileManager(shell);

    log.ok("Cursor has been successfully installed and pinned to your dock!");
    log.info("You can now launch it from the applications menu, the dock, or by typing 'cursor' in your terminal.");

    return { version: release.version, downloaded: !upToDate };
}
