import { readFileSync } from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { createTestContext, FakeShell } from "../../testing/fakes.ts";
import { curaPaths, installCura } from "./cura.ts";

describe("cura", () => {
    it("installs Cura and makes it the STL handler", async () => {
        const shell = new FakeShell().on("xdg-mime", (args) => (args[0] === "query" ? "Ultimaker-Cura.desktop\n" : ""));
        const ctx = createTestContext({ shell });
        ctx.http.route(ctx.config.cura.appImageUrl, "appimage").route(ctx.config.cura.iconUrl, "png");

        const result = await installCura(ctx);
        const paths = curaPaths(ctx);

        expect(result).toEqual({
            appImage: paths.appImage,
            defaults: {
                "application/sla": "Ultimaker-Cura.desktop",
                "application/vnd.ms-pki.stl": "Ultimaker-Cura.desktop",
            },
        });
        expect(paths.icon).toBe(path.join(ctx.home, ".local/share/icons/hicolor/256x256/apps/Ultimaker-Cura.png"));
        expect(readFileSync(paths.icon, "utf8")).toBe("png");

        expect(readFileSync(path.join(ctx.config.paths.applicationsDir, "Ultimaker-Cura.desktop"), "utf8")).toBe([
            "[Desktop Entry]",
            "Type=Application",
            "Name=Ultimaker Cura",
            `Exec=${paths.appImage} %U`,
            `Icon=${paths.icon}`,
            "Terminal=false",
            "Categories=Graphics;3DPrinting;",
            "MimeType=application/sla;application/vnd.ms-pki.stl;",
            "",
        ].join("\n"));

        expect(shell.lines()).toEqual([
            `update-mime-database ${ctx.config.paths.mimeDir}`,
            "xdg-mime default Ultimaker-Cura.desktop application/sla",
            "xdg-mime default Ultimaker-Cura.desktop application/vnd.ms-pki.stl",
            "xdg-mime query default application/sla",
            "xdg-mime query default application/vnd.ms-pki.stl",
        ]);
    });

    it("does not download files that are already there", async () => {
        const ctx = createTestContext();
        ctx.http.route(ctx.config.cura.appImageUrl, "appimage").route(ctx.config.cura.iconUrl, "png");
        await installCura(ctx);
        ctx.http.requested.length = 0;

        await installCura(ctx, { appImageUrl: "https://mirror.example/cura.AppImage" });
        expect(ctx.http.requested).toEqual([]);
    });
});
