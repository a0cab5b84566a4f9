import { describe, expect, it } from "vitest";
import { FakeHttp } from "../../testing/fakes.ts";
import { ReleaseLookupError } from "../system/errors.ts";
import {
    fetchCursorRelease,
    fetchGithubLatestRelease,
    fetchGnomeExtensionDownload,
    fetchJetbrainsRelease,
    parseGnomeShellVersion,
    pickUbuntuAsset,
} from "./releases.ts";

const CURSOR_API = "https://cursor.example/api/download";
const SITE = "https://extensions.example";

describe("releases", () => {
    it("reads the Cursor download API", async () => {
        const http = new FakeHttp({
            [CURSOR_API]: { downloadUrl: "https://downloads.example/cursor-1.2.3.AppImage", version: "1.2.3", commitSha: "abc" },
        });

        expect(await fetchCursorRelease(http, CURSOR_API)).toEqual({
            downloadUrl: "https://downloads.example/cursor-1.2.3.AppImage",
            version: "1.2.3",
        });
    });

    it("rejects a Cursor answer without a version", async () => {
        const http = new FakeHttp({ [CURSOR_API]: { downloadUrl: "https://downloads.example/cursor.AppImage" } });
        await expect(fetchCursorRelease(http, CURSOR_API)).rejects.toThrow(ReleaseLookupError);
    });

    it("picks the Ubuntu asset of the latest GitHub release", async () => {
        const http = new FakeHttp({
            "https://api.github.com/repos/acme/studio/releases/latest": {
                tag_name: "v02.00.00",
                assets: [
                    { name: "Studio_fedora.AppImage", browser_download_url: "https://gh.example/Studio_linux_fedora.AppImage" },
                    { name: "Studio_ubuntu.txt", browser_download_url: "https://gh.example/Studio_ubuntu-24.04.txt" },
                    { name: "Studio_ubuntu.zip", browser_download_url: "https://gh.example/Studio_ubuntu-24.04.zip" },
                ],
            },
        });

        const release = await fetchGithubLatestRelease(http, "acme/studio");
        expect(release.tagName).toBe("v02.00.00");
        expect(pickUbuntuAsset(release)?.browserDownloadUrl).toBe("https://gh.example/Studio_ubuntu-24.04.zip");
        expect(pickUbuntuAsset({ tagName: "v1", assets: [] })).toBeUndefined();
    });

    it("reads the first JetBrains release for the product", async () => {
        const http = new FakeHttp({
            "https://jb.example/releases?code=RM&latest=true&type=release": {
                RM: [{ version: "2024.3", downloads: { linux: { link: "https://download.example/RubyMine-2024.3.tar.gz" } } }],
            },
            "https://jb.example/releases?code=XX&latest=true&type=release": {},
        });

        expect(await fetchJetbrainsRelease(http, "https://jb.example/releases", "RM")).toEqual({
            version: "2024.3",
            downloadUrl: "https://download.example/RubyMine-2024.3.tar.gz",
        });
        await expect(fetchJetbrainsRelease(http, "https://jb.example/releases", "XX")).rejects.toThrow(ReleaseLookupError);
    });

    it("extracts the GNOME Shell major version", () => {
        expect(parseGnomeShellVersion("GNOME Shell 46.2")).toBe("46");
        expect(parseGnomeShellVersion("GNOME Shell 3.38.4")).toBe("3");
        expect(parseGnomeShellVersion("GNOME Shell")).toBeNull();
    });

    it("prefers the build for the running shell", async () => {
        const http = new FakeHttp({
            [`${SITE}/extension-info/?pk=4703&shell_version=46`]: { download_url: "/download-extension/dock.zip?version_tag=1" },
        });

        expect(await fetchGnomeExtensionDownload(http, SITE, 4703, "46"))
            .toBe(`${SITE}/download-extension/dock.zip?version_tag=1`);
    });

    it("falls back to any build", async () => {
        const http = new FakeHttp({
            [`${SITE}/extension-info/?pk=4703`]: { download_url: "https://mirror.example/dock.zip" },
        });

        expect(await fetchGnomeExtensionDownload(http, SITE, 4703, "47")).toBe("https://mirror.example/dock.zip");
        expect(http.requested).toEqual([
            `${SITE}/extension-info/?pk=4703&shell_version=47`,
            `${SITE}/extension-info/?pk=4703`,
        ]);
    });

    it("fails when no build is offered", async () => {
        const http = new FakeHttp({ [`${SITE}/extension-info/?pk=1`]: { download_url: null } });

        await expect(fetchGnomeExtensionDownload(http, SITE, 1, null)).rejects.toThrow(
            `Could not find a compatible version for GNOME Shell unknown. You may need to install this extension manually from: ${SITE}/extension/1/`,
        );
    });
});
