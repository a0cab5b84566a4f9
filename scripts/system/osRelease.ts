import { existsSync, readFileSync } from "node:fs";
import { PreconditionError } from "./errors.ts";

export interface Distribution {
    id: string;
    name: string;
    idLike: string[];
    versionId?: string;
    codename?: string;
}

export function parseOsRelease(text: string) {
    const fields: Record<string, string> = {};

    for (const raw of text.split("\n")) {
        const line = raw.trim();
        if (!line || line.startsWith("#")) continue;

        const eq = line.indexOf("=");
        if (eq <= 0) continue;

        const key = line.slice(0, eq);
        let value = line.slice(eq + 1);
        if (/^(["']).*\1$/.test(value)) value = value.slice(1, -1);

        fields[key] = value;
    }

    return fields;
}

export function detectDistribution(osReleasePath = "/etc/os-release"): Distribution {
    if (!existsSync(osReleasePath)) {
        throw new PreconditionError(`Cannot detect distribution. ${osReleasePath} not found.`);
    }

    const fields = parseOsRelease(readFileSync(osReleasePath, "utf8"));
    const id = fields.ID ?? "linux";

    return {
        id,
        name: fields.NAME ?? fields.PRETTY_NAME ?? id,
        idLike: (fields.ID_LIKE ?? "").split(/\s+/).filter(Boolean),
        versionId: fields.VERSION_ID,
        codename: fields.VERSION_CODENAME || fields.UBUNTU_CODENAME || undefined,
    };
}

export function isDebianFamily(dist: Distribution) {
    return [dist.id, ...dist.idLike].some((id) => id === "debian" || id === "ubuntu");
}
