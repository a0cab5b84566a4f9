import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { createTestContext, FakeShell } from "../../testing/fakes.ts";
import { clearIconCaches, installMimeTypeIcons, isSvg, renderPlaceholderIcon, replaceThemeMimeIcons } from "./icons.ts";

describe("icons", () => {
    it("recognises svg by its first line", () => {
        expect(isSvg(`<?xml version="1.0"?>\n<svg/>`)).toBe(true);
        expect(isSvg(`<svg xmlns="http://www.w3.org/2000/svg"/>`)).toBe(true);
        expect(isSvg("\x89PNG\r\n")).toBe(false);
    });

    it("centres placeholder text lines", () => {
        const single = renderPlaceholderIcon({ lines: ["BS"], background: "#4CAF50", foreground: "white" });
        expect(single.split("\n")[1]).toBe(`  <rect width="256" height="256" fill="#4CAF50"/>`);
        expect(single).toContain(`y="130"`);

        const framed = renderPlaceholderIcon({ lines: ["Ruby", "Mine"], background: "#D10", foreground: "#D10", frame: "#000" });
        expect(framed.split("\n")).toHaveLength(7);
        expect(framed).toContain(`<text x="128" y="110"`);
        expect(framed).toContain(`<text x="128" y="150"`);
        expect(framed.endsWith("</svg>\n")).toBe(true);
    });

    it("removes icon caches and optionally thumbnails", () => {
        const { config } = createTestContext();
        const cache = config.paths.cacheDir;
        mkdirSync(path.join(cache, "thumbnails"), { recursive: true });
        writeFileSync(path.join(cache, "icon-cache.kcache"), "");

        clearIconCaches(cache);
        expect(existsSync(path.join(cache, "icon-cache.kcache"))).toBe(false);
        expect(existsSync(path.join(cache, "thumbnails"))).toBe(true);

        clearIconCaches(cache, { thumbnails: true });
        expect(existsSync(path.join(cache, "thumbnails"))).toBe(false);
    });

    it("installs mime icons at three sizes with aliases", async () => {
        const shell = new FakeShell({ available: ["convert"] })
            .on("convert", (args) => writeFileSync(args[3] ?? "", `png ${args[2]}`));
        const ctx = createTestContext({ shell });
        const icon = path.join(ctx.home, "app.png");
        writeFileSync(icon, "original");

        expect(await installMimeTypeIcons(ctx, icon, ["model-stl", "application-x-3dmf"])).toBe(true);

        const hicolor = path.join(ctx.config.paths.iconsDir, "hicolor");
        expect(readFileSync(path.join(hicolor, "48x48/mimetypes/application-x-3dmf.png"), "utf8")).toBe("png 48x48");
        expect(readFileSync(path.join(hicolor, "256x256/mimetypes/model-stl.png"), "utf8")).toBe("original");
        expect(shell.lines()).toEqual([
            `convert ${icon} -resize 48x48 ${path.join(hicolor, "48x48/mimetypes/model-stl.png")}`,
            `convert ${icon} -resize 128x128 ${path.join(hicolor, "128x128/mimetypes/model-stl.png")}`,
        ]);
    });

    it("skips mime icons without ImageMagick", async () => {
        const ctx = createTestContext();
        expect(await installMimeTypeIcons(ctx, "/nowhere.png", ["model-stl"])).toBe(false);
    });

    it("replaces only the theme sizes that exist", async () => {
        const ctx = createTestContext({ shell: new FakeShell({ available: ["convert"] }) });
        const theme = ctx.config.system.systemIconTheme;
        for (const dir of ["16x16", "48x48@2x"]) {
            mkdirSync(path.join(theme, dir, "mimetypes"), { recursive: true });
            writeFileSync(path.join(theme, dir, "mimetypes/model-stl.png"), "");
        }

        expect(await replaceThemeMimeIcons(ctx, "/tmp/icon.svg", theme, "model-stl")).toBe(2);

        const installs = ctx.shell.lines().filter((line) => line.startsWith("sudo install"));
        expect(installs).toHaveLength(2);
        expect(installs[0]?.endsWith(path.join(theme, "16x16/mimetypes/model-stl.png"))).toBe(true);
        expect(installs[1]?.endsWith(path.join(theme, "48x48@2x/mimetypes/model-stl.png"))).toBe(true);
        expect(ctx.shell.commands[0]?.args).toContain("16x16");
        expect(ctx.shell.commands[2]?.args).toContain("96x96");
    });
});
