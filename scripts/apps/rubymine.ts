import { chmodSync, copyFileSync, cpSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type { SetupContext } from "../../types.ts";
import { errorMessage, PreconditionError } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";
import { detectDistribution, isDebianFamily } from "../system/osRelease.ts";
import { isGnome } from "../system/desktopEnv.ts";
import { ensureCommands } from "../system/packages.ts";
import { withTempDir } from "../system/tempDir.ts";
import { extractTarball, findFiles } from "../system/archive.ts";
import { installDesktopEntry } from "../desktop/entry.ts";
import { pinToDock } from "../desktop/dock.ts";
import { clearIconCaches, findFirstExisting, renderPlaceholderIcon, updateIconCache } from "../desktop/icons.ts";
import { isOnPath } from "../user/shellRc.ts";
import { fetchJetbrainsRelease } from "./releases.ts";

const log = createReporter("rubymine");

const DESKTOP_FILE = "rubymine.desktop";

const PLACEHOLDER = renderPlaceholderIcon({
    lines: ["Ruby", "Mine"],
    background: "#DD1100",
    foreground: "#DD1100",
    frame: "#000000",
});

export function rubyminePaths(ctx: SetupContext) {
    const { installRoot, dataDir, iconsDir } = ctx.config.paths;
    // the launcher takes the `rubymine` name in installRoot
    const installDir = path.join(dataDir, "rubymine");
    return {
        installDir,
        launcher: path.join(installDir, "bin/rubymine.sh"),
        productInfo: path.join(installDir, "product-info.json"),
        cli: path.join(installRoot, "rubymine"),
        iconsDir,
    };
}

const productInfoSchema = z.object({ version: z.string() });

export function installedVersion(productInfo: string) {
    if (!existsSync(productInfo)) return null;
    try {
        const parsed = productInfoSchema.safeParse(JSON.parse(readFileSync(productInfo, "utf8")));
        return parsed.success ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}

/** false means the user kept the current install. */
async function checkExistingInstallation(ctx: SetupContext, latest: string, assumeYes: boolean) {
    const paths = rubyminePaths(ctx);
    if (!existsSync(paths.launcher)) return true;

    log.warn(`RubyMine installation found at ${paths.installDir}`);
    const installed = installedVersion(paths.productInfo);

    if (installed === null) {
        log.warn("Cannot determine installed version. Proceeding with installation...");
    } else if (installed === latest) {
        log.ok(`Latest version ${installed} is already installed!`);
        if (!assumeYes && !await ctx.prompt.confirm("Do you want to reinstall?", false)) {
            return false;
        }
    } else {
        log.warn(`Installed version ${installed} differs from ${latest}. Proceeding with update...`);
    }

    log.step("Removing existing installation...");
    rmSync(paths.installDir, { recursive: true, force: true });
    return true;
}

function setupIcon(ctx: SetupContext) {
    const { installDir, iconsDir } = rubyminePaths(ctx);
    log.step("Setting up RubyMine icon...");

    const found = findFirstExisting([
        "bin/rubymine.png",
        "bin/rubymine.svg",
        "lib/rubymine.png",
        "lib/rubymine.svg",
        "plugins/ruby/lib/ruby.png",
    ].map((candidate) => path.join(installDir, candidate)));

    mkdirSync(iconsDir, { recursive: true });

    if (found) {
        const icon = path.join(iconsDir, `rubymine${path.extname(found)}`);
        copyFileSync(found, icon);
        log.ok(`Icon installed to ${icon}`);
        return icon;
    }

    log.warn("No icon found in RubyMine installation, creating placeholder...");
    const icon = path.join(iconsDir, "rubymine.svg");
    writeFileSync(icon, PLACEHOLDER);
    return icon;
}

function createCliLauncher(ctx: SetupContext) {
    const { cli, launcher } = rubyminePaths(ctx);
    const binDir = path.dirname(cli);

    log.step("Creating command line launcher...");
    mkdirSync(binDir, { recursive: true });
    writeFileSync(cli, `#!/bin/bash\n# RubyMine command line launcher\nexec "${launcher}" "$@"\n`);
    chmodSync(cli, 0o755);

    if (isOnPath(binDir, ctx.config.path)) {
        log.ok("Command line launcher 'rubymine' is now available");
    } else {
        log.warn(`Note: Add ${binDir} to your PATH to use 'rubymine' command`);
        log.warn(`Add this line to your ~/.bashrc: export PATH="${binDir}:$PATH"`);
    }
}

export async function installRubymine(ctx: SetupContext, { yes = false } = {}) {
    const { shell, http, config } = ctx;
    const paths = rubyminePaths(ctx);

    log.step("Starting RubyMine installation...");

    const dist = detectDistribution(config.system.osReleasePath);
    log.ok(`Detected distribution: ${dist.name}`);
    if (!isDebianFamily(dist)) log.warn(`${dist.name} is not Debian based; apt steps may fail.`);

    await ensureCommands(shell, { tar: "tar" });

    log.step("Fetching latest RubyMine release information...");
    const release = await fetchJetbrainsRelease(http, config.rubymine.releasesApi, config.rubymine.productCode);
    log.ok(`Latest RubyMine version: ${release.version}`);
    log.info(`Download URL: ${release.downloadUrl}`);

    if (!await checkExistingInstallation(ctx, release.version, yes)) {
        log.ok("Installation cancelled.");
        return { version: release.version, installed: false };
    }

    mkdirSync(paths.installDir, { recursive: true });
    mkdirSync(config.paths.applicationsDir, { recursive: true });

    await withTempDir("rubymine", async (workDir) => {
        log.step(`Downloading RubyMine ${release.version}...`);
        const tarball = path.join(workDir, path.basename(new URL(release.downloadUrl).pathname));
        await http.download(release.downloadUrl, tarball);

        log.step("Extracting RubyMine...");
        const extractDir = path.join(workDir, "extracted");
        mkdirSync(extractDir);
        await extractTarball(shell, tarball, extractDir);

        const [extracted] = findFiles(extractDir, (f) => f.isDirectory && f.name.startsWith("RubyMine-"), 1);
        if (!extracted) throw new PreconditionError("Could not find extracted RubyMine directory");
        log.ok(`Found extracted directory: ${path.basename(extracted)}`);

        // the temp dir may sit on another filesystem, so copy rather than rename
        cpSync(extracted, paths.installDir, { recursive: true, verbatimSymlinks: true });
    });

    if (!existsSync(paths.launcher)) throw new PreconditionError(`${paths.launcher} missing from the RubyMine archive`);
    chmodSync(paths.launcher, 0o755);
    log.ok(`RubyMine installed to ${paths.installDir}`);

    const icon = setupIcon(ctx);

    await installDesktopEntry(ctx, DESKTOP_FILE, {
        version: "1.0",
        name: "RubyMine",
        comment: "Ruby and Rails IDE",
        exec: `${paths.launcher} %f`,
        icon,
        terminal: false,
        categories: ["Development", "IDE"],
        startupWMClass: "jetbrains-rubymine",
        mimeTypes: ["text/x-ruby", "application/x-ruby", "text/x-script.ruby"],
        keywords: ["ruby", "rails", "ide", "jetbrains", "development"],
    }, { bestEffort: true });

    createCliLauncher(ctx);

    await updateIconCache(shell, config.paths.iconsDir);
    clearIconCaches(config.paths.cacheDir, { thumbnails: true });

    log.ok(`Detected desktop environment: ${config.desktop}`);
    if (isGnome(config.desktop)) {
        try {
            await pinToDock(shell, DESKTOP_FILE);
        } catch (err) {
            log.warn(`Could not update GNOME favorites: ${errorMessage(err)}`);
        }
    } else {
        log.warn("Desktop environment not specifically supported for dock integration");
        log.warn("RubyMine should appear in your applications menu");
    }

    log.ok(`RubyMine ${release.version} has been successfully installed!`);
    log.info(`Installation location: ${paths.installDir}`);
    log.info(`You can now launch RubyMine from the applications menu, with 'rubymine', or directly: ${paths.launcher}`);

    return { version: release.version, installed: true };
}
