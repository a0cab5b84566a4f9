import { readFileSync, writeFileSync } from "node:fs";
import type { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram, type GlobalOptions } from "./cli.ts";
import { createTestContext, FakeShell, type TestContext } from "./testing/fakes.ts";

function run(ctx: TestContext, ...args: string[]) {
    return createProgram(() => ctx).parseAsync(["node", "desk-setup", ...args]);
}

/** Turns commander's exits into rejections and collects what it prints to stderr. */
function captureErrors(program: Command) {
    const output = { err: "" };
    for (const command of [program, ...program.commands]) {
        command.exitOverride().configureOutput({
            writeErr: (text) => {
                output.err += text;
            },
        });
    }
    return output;
}

describe("cli", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => { });
        vi.spyOn(console, "warn").mockImplementation(() => { });
        vi.spyOn(console, "error").mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
    });

    it("runs a subcommand with its options", async () => {
        const ctx = createTestContext({ shell: new FakeShell({ available: ["apt"], root: true }) });
        writeFileSync(ctx.config.system.fstabPath, "");

        await run(ctx, "nfs-client", "--host", "10.0.0.5");

        expect(process.exitCode).toBeUndefined();
        expect(readFileSync(ctx.config.system.fstabPath, "utf8")).toContain("10.0.0.5:/home /mnt/nfs/home nfs defaults,_netdev 0 0\n");
    });

    it("prints failures and exits 1", async () => {
        const ctx = createTestContext();

        await run(ctx, "nfs-server");

        expect(process.exitCode).toBe(1);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining("[ X ] This command must be run as root (use sudo)"));
    });

    it("exits 1 when a workstation task failed", async () => {
        const ctx = createTestContext();

        await run(ctx, "workstation", "--select", "7");

        expect(process.exitCode).toBe(1);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining("[ X ] Failed: lastpass"));
    });

    it("hands the global options to the context factory", async () => {
        const seen: GlobalOptions[] = [];
        const program = createProgram((options) => {
            seen.push(options);
            throw new Error("no context in this test");
        });

        await program.parseAsync(["node", "desk-setup", "-c", "conf.json", "-d", "cursor"]);

        expect(seen).toEqual([{ config: "conf.json", debug: true }]);
        expect(process.exitCode).toBe(1);
    });

    it("accepts the dock-from-dash alias", async () => {
        const ctx = createTestContext();

        await run(ctx, "dock-from-dash");

        expect(console.error).toHaveBeenCalledWith(
            expect.stringContaining("[ X ] GNOME Shell is not installed. This extension requires GNOME Shell."),
        );
    });

    it("prints usage after an unknown option", async () => {
        const program = createProgram(() => createTestContext());
        const output = captureErrors(program);

        await expect(program.parseAsync(["node", "desk-setup", "--bogus"]))
            .rejects.toMatchObject({ code: "commander.unknownOption", exitCode: 1 });

        expect(output.err).toContain("error: unknown option '--bogus'\n");
        expect(output.err).toContain("Usage: desk-setup [options] [command]");
    });

    it("rejects an NFS host that is not an IP address", async () => {
        const ctx = createTestContext({ shell: new FakeShell({ available: ["apt"], root: true }) });
        writeFileSync(ctx.config.system.fstabPath, "server2:/data /mnt/data nfs defaults 0 0\n");
        const program = createProgram(() => ctx);
        const output = captureErrors(program);

        await expect(program.parseAsync(["node", "desk-setup", "nfs-client", "--host", ""]))
            .rejects.toMatchObject({ code: "commander.invalidArgument", exitCode: 1 });

        expect(output.err).toContain("Expected an IP address.");
        expect(output.err).toContain("Usage: desk-setup nfs-client [options]");
        expect(readFileSync(ctx.config.system.fstabPath, "utf8")).toBe("server2:/data /mnt/data nfs defaults 0 0\n");
        expect(ctx.shell.lines()).toEqual([]);
    });
});
