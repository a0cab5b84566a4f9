import { z } from "zod";
import type { AppRelease } from "../../types.ts";
import type { Http } from "../system/http.ts";
import { errorMessage, ReleaseLookupError } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";

const log = createReporter("releases");

const cursorSchema = z.object({
    downloadUrl: z.string().url(),
    version: z.string().min(1),
});

export async function fetchCursorRelease(http: Http, apiUrl: string): Promise<AppRelease> {
    const parsed = cursorSchema.safeParse(await http.json(apiUrl));
    if (!parsed.success) {
        throw new ReleaseLookupError("Failed to fetch version information from the Cursor API");
    }
    return parsed.data;
}

const githubReleaseSchema = z.object({
    tag_name: z.string().min(1),
    assets: z.array(z.object({
        name: z.string(),
        browser_download_url: z.string().url(),
    })).default([]),
});

export interface GithubRelease {
    tagName: string;
    assets: { name: string; browserDownloadUrl: string }[];
}

export async function fetchGithubLatestRelease(http: Http, repo: string): Promise<GithubRelease> {
    const parsed = githubReleaseSchema.safeParse(
        await http.json(`https://api.github.com/repos/${repo}/releases/latest`),
    );
    if (!parsed.success) {
        throw new ReleaseLookupError(`Failed to get latest version information for ${repo}`);
    }

    return {
        tagName: parsed.data.tag_name,
        assets: parsed.data.assets.map((a) => ({ name: a.name, browserDownloadUrl: a.browser_download_url })),
    };
}

/** First asset built for Ubuntu, shipped either as a zip or a bare AppImage. */
export function pickUbuntuAsset(release: GithubRelease) {
    return release.assets.find(({ browserDownloadUrl: url }) =>
        url.includes("ubuntu") && (url.endsWith(".zip") || url.endsWith(".AppImage"))
    );
}

const jetbrainsEntrySchema = z.object({
    version: z.string().min(1),
    downloads: z.object({
        linux: z.object({ link: z.string().url() }),
    }),
});

export async function fetchJetbrainsRelease(http: Http, releasesApi: string, code: string): Promise<AppRelease> {
    const url = `${releasesApi}?code=${encodeURIComponent(code)}&latest=true&type=release`;
    const body = z.record(z.array(z.unknown())).safeParse(await http.json(url));
    const latest = jetbrainsEntrySchema.safeParse(body.success ? body.data[code]?.[0] : undefined);

    if (!latest.success) {
        throw new ReleaseLookupError(`Could not parse release information for JetBrains product ${code}`);
    }

    return { version: latest.data.version, downloadUrl: latest.data.downloads.linux.link };
}

/** `GNOME Shell 46.2` gives `46`. */
export function parseGnomeShellVersion(output: string) {
    return output.match(/(\d+)(?:\.\d+)*/)?.[1] ?? null;
}

const extensionInfoSchema = z.object({
    download_url: z.string().min(1).optional().nullable(),
});

async function extensionDownloadPath(http: Http, url: string) {
    try {
        const parsed = extensionInfoSchema.safeParse(await http.json(url));
        return parsed.success ? parsed.data.download_url ?? null : null;
    } catch (err) {
        log.warn(`Could not fetch extension metadata from ${url}: ${errorMessage(err)}`);
        return null;
    }
}

/**
 * Asks extensions.gnome.org for the build matching the running shell, then
 * for any build at all. Relative download paths are made absolute.
 */
export async function fetchGnomeExtensionDownload(http: Http, siteUrl: string, pk: number, shellVersion: string | null) {
    const base = `${siteUrl}/extension-info/?pk=${pk}`;

    let download = shellVersion
        ? await extensionDownloadPath(http, `${base}&shell_version=${encodeURIComponent(shellVersion)}`)
        : null;

    if (!download) download = await extensionDownloadPath(http, base);

    if (!download) {
        throw new ReleaseLookupError(
            `Could not find a compatible version for GNOME Shell ${shellVersion ?? "unknown"}. ` +
            `You may need to install this extension manually from: ${siteUrl}/extension/${pk}/`,
        );
    }

    return download.startsWith("/") ? `${siteUrl}${download}` : download;
}
