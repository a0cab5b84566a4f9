import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { PreconditionError } from "./errors.ts";
import { detectDistribution, isDebianFamily, parseOsRelease } from "./osRelease.ts";

const UBUNTU = `PRETTY_NAME="Ubuntu 24.04.1 LTS"
NAME="Ubuntu"
VERSION_ID="24.04"
# comment
ID=ubuntu
ID_LIKE=debian
VERSION_CODENAME=noble
`;

describe("osRelease", () => {
    it("strips quotes and ignores comments", () => {
        const fields = parseOsRelease(UBUNTU);
        expect(fields.NAME).toBe("Ubuntu");
        expect(fields.VERSION_ID).toBe("24.04");
        expect(fields.ID).toBe("ubuntu");
        expect(Object.keys(fields)).toHaveLength(6);
    });

    it("detects the distribution from a file", () => {
        const file = path.join(mkdtempSync(path.join(tmpdir(), "os-release-")), "os-release");
        writeFileSync(file, UBUNTU);

        const dist = detectDistribution(file);
        expect(dist).toEqual({
            id: "ubuntu",
            name: "Ubuntu",
            idLike: ["debian"],
            versionId: "24.04",
            codename: "noble",
        });
        expect(isDebianFamily(dist)).toBe(true);
    });

    it("recognises derivatives through ID_LIKE only", () => {
        expect(isDebianFamily({ id: "pop", name: "Pop!_OS", idLike: ["ubuntu", "debian"] })).toBe(true);
        expect(isDebianFamily({ id: "fedora", name: "Fedora Linux", idLike: [] })).toBe(false);
    });

    it("fails when the file is missing", () => {
        expect(() => detectDistribution("/nonexistent/os-release")).toThrow(PreconditionError);
        expect(() => detectDistribution("/nonexistent/os-release"))
            .toThrow("Cannot detect distribution. /nonexistent/os-release not found.");
    });
});
