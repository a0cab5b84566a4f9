import { describe, expect, it } from "vitest";
import { FakeHttp, FakeShell } from "../../testing/fakes.ts";
import { CommandError, PreconditionError } from "./errors.ts";
import { addAptSource, aptInstall, ensureCommands, isPackageInstalled, missingPackages, snapInstall } from "./packages.ts";

describe("packages", () => {
    it("reads dpkg status", async () => {
        const shell = new FakeShell().on("dpkg-query", (args) => {
            if (args[2] === "git") return "install ok installed";
            throw new CommandError("dpkg-query", args, 1, "no packages found");
        });

        expect(await isPackageInstalled(shell, "git")).toBe(true);
        expect(await isPackageInstalled(shell, "libfoo")).toBe(false);
        expect(await missingPackages(shell, ["git", "libfoo", "libbar"])).toEqual(["libfoo", "libbar"]);
    });

    it("refreshes and installs through the first apt frontend found", async () => {
        const shell = new FakeShell({ available: ["apt-get"] });
        await aptInstall(shell, ["curl", "git"]);

        expect(shell.lines()).toEqual(["sudo apt-get update", "sudo apt-get install -y curl git"]);
    });

    it("does nothing for an empty package list", async () => {
        const shell = new FakeShell();
        await aptInstall(shell, []);
        expect(shell.commands).toEqual([]);
    });

    it("rejects without apt", async () => {
        await expect(aptInstall(new FakeShell(), ["curl"])).rejects.toThrow(PreconditionError);
    });

    it("installs one package per missing command", async () => {
        const shell = new FakeShell({ available: ["apt", "tar"] });
        const installed = await ensureCommands(shell, { tar: "tar", convert: "imagemagick", identify: "imagemagick" });

        expect(installed).toEqual(["imagemagick"]);
        expect(shell.lines()).toEqual(["sudo apt update", "sudo apt install -y imagemagick"]);
    });

    it("passes --classic to snap when asked", async () => {
        const shell = new FakeShell();
        await snapInstall(shell, "flameshot");
        await snapInstall(shell, "code", { classic: true });

        expect(shell.lines()).toEqual(["sudo snap install flameshot", "sudo snap install code --classic"]);
    });

    it("dearmors keys and writes the source list", async () => {
        const shell = new FakeShell();
        const http = new FakeHttp({ "https://repo.example/key.asc": "ARMORED" });

        await addAptSource(shell, http, {
            name: "example",
            keyUrl: "https://repo.example/key.asc",
            keyring: "/etc/apt/keyrings/example.gpg",
            dearmor: true,
            line: "deb [signed-by=/etc/apt/keyrings/example.gpg] https://repo.example stable main",
        });

        expect(shell.lines()).toEqual([
            "sudo mkdir -p /etc/apt/keyrings",
            "sudo gpg --dearmor --yes -o /etc/apt/keyrings/example.gpg",
            "sudo tee /etc/apt/sources.list.d/example.list",
        ]);
        expect(Buffer.from(shell.commands[1]?.options.input ?? "").toString()).toBe("ARMORED");
        expect(shell.commands[2]?.options.input)
            .toBe("deb [signed-by=/etc/apt/keyrings/example.gpg] https://repo.example stable main\n");
    });
});
