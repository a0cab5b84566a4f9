import { chmodSync, closeSync, copyFileSync, existsSync, mkdirSync, openSync, readFileSync, readSync, rmSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import { PreconditionError, ReleaseLookupError, errorMessage } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";
import { aptInstall, missingPackages } from "../system/packages.ts";
import { withTempDir } from "../system/tempDir.ts";
import { extractZip, findFiles } from "../system/archive.ts";
import { installDesktopEntry } from "../desktop/entry.ts";
import { installMimePackage, setDefaultApplication, type MimeTypeDefinition } from "../desktop/mime.ts";
import { pinToDock } from "../desktop/dock.ts";
import {
    clearIconCaches,
    installMimeTypeIcons,
    isSvg,
    renderPlaceholderIcon,
    replaceThemeMimeIcons,
    restartFileManager,
    updateIconCache,
} from "../desktop/icons.ts";
import { fetchGithubLatestRelease, pickUbuntuAsset } from "./releases.ts";

const log = createReporter("bambu-studio");

const DESKTOP_FILE = "bambu-studio.desktop";
const STL_ICON = "model-stl";

const STL_TYPES: { type: string; label: string; magic?: boolean }[] = [
    { type: "model/stl", label: "STL 3D Model", magic: true },
    { type: "application/sla", label: "SLA 3D Model" },
    { type: "application/vnd.ms-pki.stl", label: "STL 3D Model (Microsoft)" },
    { type: "model/x.stl-ascii", label: "STL 3D Model (ASCII)" },
    { type: "model/x.stl-binary", label: "STL 3D Model (Binary)" },
];

export const STL_MIME_TYPES: MimeTypeDefinition[] = STL_TYPES.map(({ type, label, magic }) => ({
    type,
    comments: [{ text: label }, { text: label, lang: "en" }],
    globs: ["*.stl", "*.STL"],
    magic: magic ? [{ value: "solid", type: "string", offset: 0, priority: 50 }] : undefined,
    icon: STL_ICON,
}));

const PLACEHOLDER = renderPlaceholderIcon({ lines: ["BS"], background: "#4CAF50", foreground: "white" });

export interface BambuStudioOptions {
    /** zip or AppImage; skips the GitHub release lookup. */
    url?: string;
    /** Also overwrite the STL icons of the system icon theme (needs sudo). */
    systemIcons?: boolean;
}

export function bambuPaths(ctx: SetupContext) {
    const installDir = path.join(ctx.config.paths.installRoot, "bambu-studio");
    return {
        installDir,
        appImage: path.join(installDir, "bambu-studio.AppImage"),
        icon: path.join(ctx.config.paths.iconsDir, "bambu-studio.svg"),
    };
}

const ELF_MAGIC = [0x7f, 0x45, 0x4c, 0x46];

export function isElfExecutable(file: string) {
    const header = Buffer.alloc(4);
    const fd = openSync(file, "r");
    try {
        readSync(fd, header, 0, 4, 0);
    } finally {
        closeSync(fd);
    }
    return ELF_MAGIC.every((byte, i) => header[i] === byte);
}

async function ensureDependencies(ctx: SetupContext) {
    const { shell, config } = ctx;

    log.step("Checking dependencies...");
    const packages = await missingPackages(shell, ["libwebkit2gtk-4.1-0"]);

    const converters = ["convert", "inkscape", "rsvg-convert"];
    const hasConverter = (await Promise.all(converters.map((c) => shell.exists(c)))).some(Boolean);
    if (!hasConverter) {
        log.warn("No image conversion tools found. Installing ImageMagick for icon processing...");
        packages.push("imagemagick");
    }

    if (packages.length) {
        log.step(`Installing required dependencies: ${packages.join(" ")}`);
        await aptInstall(shell, packages);
    }

    // Ubuntu 24.04 only ships the 4.1 ABI; the AppImage links against 4.0.
    log.step("Setting up WebKit compatibility...");
    const links = [
        ["libwebkit2gtk-4.1.so.0", "libwebkit2gtk-4.0.so.37"],
        ["libjavascriptcoregtk-4.1.so.0", "libjavascriptcoregtk-4.0.so.18"],
    ];
    for (const [target, link] of links) {
        const linkPath = path.join(config.system.libDir, link);
        if (!existsSync(linkPath)) {
            await shell.exec("ln", ["-sf", path.join(config.system.libDir, target), linkPath], { sudo: true });
        }
    }
}

async function resolveDownload(ctx: SetupContext, customUrl?: string) {
    if (customUrl) {
        log.warn(`Using custom download URL: ${customUrl}`);
        return { url: customUrl, version: "custom" };
    }

    log.step("Fetching latest Bambu Studio release information...");
    const release = await fetchGithubLatestRelease(ctx.http, ctx.config.bambuStudio.repo);
    log.ok(`Latest version found: ${release.tagName}`);

    const asset = pickUbuntuAsset(release);
    if (!asset) {
        throw new ReleaseLookupError(
            `No Ubuntu download found for version ${release.tagName}. ` +
            "You can specify a custom download URL using: bambu-studio --url <URL>",
        );
    }

    return { url: asset.browserDownloadUrl, version: release.tagName };
}

/** Returns the AppImage inside the download, unpacking zips first. */
function locateAppImage(file: string, workDir: string) {
    const name = path.basename(file);

    if (name.endsWith(".zip")) {
        log.step("Extracting Bambu Studio from zip file...");
        const extractDir = path.join(workDir, "extracted");
        extractZip(file, extractDir);

        const [appImage] = findFiles(extractDir, (f) => !f.isDirectory && f.name.endsWith(".AppImage"));
        if (!appImage) {
            throw new PreconditionError(
                "No AppImage found in the downloaded zip archive. Please check if the provided URL contains a valid Bambu Studio zip file.",
            );
        }
        log.ok(`Found AppImage in zip: ${path.basename(appImage)}`);
        return appImage;
    }

    if (name.endsWith(".AppImage")) {
        if (!isElfExecutable(file)) throw new PreconditionError("Downloaded file is not a valid AppImage");
        log.ok(`Found AppImage: ${name}`);
        return file;
    }

    throw new PreconditionError(
        "Downloaded file is neither a zip nor an AppImage. Supported file types: .zip (containing AppImage) or .AppImage (direct)",
    );
}

/**
 * SVG from upstream, then the PNG render, then a generated badge. Returns the
 * downloaded SVG (when there is one) for the icon theme work that follows.
 */
async function setupIcon(ctx: SetupContext, iconFile: string, workDir: string) {
    const { http, config } = ctx;

    log.step("Setting up icon...");
    if (existsSync(iconFile)) {
        log.note("Bambu Studio icon already exists, skipping download.");
        return isSvg(readFileSync(iconFile, "utf8")) ? iconFile : null;
    }

    mkdirSync(path.dirname(iconFile), { recursive: true });
    const svg = path.join(workDir, "bambu-studio.svg");

    try {
        await http.download(config.bambuStudio.iconSvgUrl, svg);
        const content = readFileSync(svg, "utf8");
        if (content.trim() && isSvg(content)) {
            copyFileSync(svg, iconFile);
            log.ok(`SVG icon installed at: ${iconFile}`);
            return svg;
        }
        log.warn("Downloaded icon is empty or not a valid SVG");
    } catch (err) {
        log.warn(`Failed to download SVG icon: ${errorMessage(err)}`);
    }

    log.warn("Trying PNG fallback...");
    try {
        await http.download(config.bambuStudio.iconPngUrl, iconFile);
        log.ok("Downloaded PNG fallback icon");
    } catch {
        log.warn("PNG fallback also failed, creating placeholder icon");
        rmSync(iconFile, { force: true });
        writeFileSync(iconFile, PLACEHOLDER);
    }
    return null;
}

export async function installBambuStudio(ctx: SetupContext, options: BambuStudioOptions = {}) {
    const { shell, http, config } = ctx;
    const paths = bambuPaths(ctx);

    if (options.url && !/^https?:\/\//.test(options.url)) {
        throw new PreconditionError("Invalid URL format. Please provide a valid HTTP/HTTPS URL.");
    }

    log.step("Starting Bambu Studio installation...");
    await ensureDependencies(ctx);

    for (const dir of [paths.installDir, config.paths.applicationsDir, config.paths.iconsDir]) {
        mkdirSync(dir, { recursive: true });
    }

    const { url, version } = await resolveDownload(ctx, options.url);

    await withTempDir("bambu-studio", async (workDir) => {
        log.step(`Downloading Bambu Studio ${version}...`);
        const file = path.join(workDir, path.basename(new URL(url).pathname));
        await http.download(url, file);

        const appImage = locateAppImage(file, workDir);
        copyFileSync(appImage, paths.appImage);
        chmodSync(paths.appImage, 0o755);

        const svg = await setupIcon(ctx, paths.icon, workDir);

        await installDesktopEntry(ctx, DESKTOP_FILE, {
            version: "1.0",
            name: "Bambu Studio",
            comment: "3D Printing Software",
            exec: `${paths.appImage} %U`,
            icon: paths.icon,
            terminal: false,
            categories: ["Graphics", "3DGraphics", "Engineering"],
            startupWMClass: "BambuStudio",
            mimeTypes: STL_MIME_TYPES.map((m) => m.type),
            extra: { "X-GNOME-SingleWindow": true },
        });

        await installMimePackage(ctx, "bambu-studio", STL_MIME_TYPES);
        await installMimeTypeIcons(ctx, paths.icon, [STL_ICON, "application-x-3dmf"]);

        if (options.systemIcons) {
            if (svg) {
                log.step("Replacing system STL icons with Bambu Studio icon...");
                await replaceThemeMimeIcons(ctx, svg, config.system.systemIconTheme, STL_ICON);
            } else {
                log.note("No SVG icon available, leaving system STL icons alone.");
            }
        }
    });

    log.step("Associating STL files with Bambu Studio...");
    await setDefaultApplication(shell, DESKTOP_FILE, STL_MIME_TYPES.map((m) => m.type));

    await pinToDock(shell, DESKTOP_FILE);

    clearIconCaches(config.paths.cacheDir, { thumbnails: true });
    await updateIconCache(shell, config.paths.iconsDir);
    await restartFileManager(shell);

    log.ok("Bambu Studio has been successfully installed and pinned to your dock!");
    log.info("STL files are now associated with Bambu Studio.");

    return { version, appImage: paths.appImage };
}
