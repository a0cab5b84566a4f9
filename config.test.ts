import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { defaultLogFile, loadConfig, readConfigSource } from "./config.ts";
import { ConfigError } from "./scripts/system/errors.ts";

const env = { HOME: "/home/dev", PATH: "/usr/bin" };

describe("config", () => {
    it("derives paths from HOME", () => {
        const config = loadConfig({ env, cwd: "/work" });

        expect(config.paths).toEqual({
            installRoot: "/home/dev/.local/bin",
            dataDir: "/home/dev/.local/share",
            applicationsDir: "/home/dev/.local/share/applications",
            iconsDir: "/home/dev/.local/share/icons",
            mimeDir: "/home/dev/.local/share/mime",
            extensionsDir: "/home/dev/.local/share/gnome-shell/extensions",
            cacheDir: "/home/dev/.cache",
        });
        expect(config.workstation).toEqual({
            projectsDir: "/home/dev/software-projects",
            filesDir: "/work",
            postgresPassword: "postgres",
        });
        expect(config.shell).toBe("/bin/bash");
        expect(config.desktop).toBe("unknown");
        expect(config.system.fstabPath).toBe("/etc/fstab");
        expect(config.nfs.client.host).toBe("192.168.15.53");
        expect(config.nfs.server.partitions.map((p) => p.device)).toEqual(["/dev/sdc1", "/dev/sdc2"]);
        expect(defaultLogFile(config)).toBe("/home/dev/.cache/desk-setup/desk-setup.log");
    });

    it("reads the desktop from the session variables", () => {
        expect(loadConfig({ env: { ...env, XDG_CURRENT_DESKTOP: "ubuntu:GNOME" } }).desktop).toBe("ubuntu:GNOME");
        expect(loadConfig({ env: { ...env, DESKTOP_SESSION: "plasma" } }).desktop).toBe("plasma");
    });

    it("merges inline JSON over the defaults", () => {
        const config = loadConfig({ env, source: `{"nfs":{"client":{"host":"10.0.0.9"}},"gnomeExtension":{"pk":"1234"}}` });

        expect(config.nfs.client.host).toBe("10.0.0.9");
        expect(config.nfs.client.shares).toHaveLength(5);
        expect(config.gnomeExtension.pk).toBe(1234);
    });

    it("reads a JSON file named by DESK_SETUP_CONFIG", () => {
        const file = path.join(mkdtempSync(path.join(tmpdir(), "config-")), "desk.json");
        writeFileSync(file, JSON.stringify({ workstation: { postgresPassword: "test-secret" } }));

        expect(loadConfig({ env: { ...env, DESK_SETUP_CONFIG: file } }).workstation.postgresPassword).toBe("test-secret");
    });

    it("names the problem with the source", () => {
        expect(() => readConfigSource("{nope")).toThrow(new ConfigError(`"{nope" is neither a readable file nor valid JSON`));
        expect(() => readConfigSource("[1, 2]")).toThrow("inline JSON must contain a JSON object");
    });

    it("reports an unreadable config path as a config error", () => {
        const dir = mkdtempSync(path.join(tmpdir(), "desk-setup-config-"));

        expect(() => readConfigSource(dir)).toThrow(ConfigError);
        expect(() => readConfigSource(dir)).toThrow(`Cannot read config file ${dir}: EISDIR`);
    });

    it("lists schema violations by field", () => {
        expect(() => loadConfig({ env: {} })).toThrow("Invalid configuration: home: HOME is not set");
        expect(() => loadConfig({ env, source: `{"nfs":{"client":{"host":"nas.local"}}}` })).toThrow(/nfs\.client\.host/);
    });
});
