import * as path from "node:path";
import { nfsHostSchema, type NfsShare } from "../../config.ts";
import type { SetupContext } from "../../types.ts";
import { ConfigError } from "../system/errors.ts";
import { requireRoot } from "../system/exec.ts";
import { createReporter } from "../system/log.ts";
import { aptInstall } from "../system/packages.ts";
import { appendLines, backupFstab, formatFstabEntry, readFstab, removeEntriesMatching, writeFstab } from "../system/fstab.ts";

const log = createReporter("nfs-client");

export interface NfsClientOptions {
    host?: string;
}

const HEADER_PREFIX = "# NFS mounts to ";

export function clientFstabBlock(host: string, label: string, mountRoot: string, shares: Pick<NfsShare, "name" | "remotePath">[]) {
    return [
        `${HEADER_PREFIX}${label} (${host})`,
        ...shares.map((share) => formatFstabEntry({
            source: `${host}:${share.remotePath}`,
            mountPoint: path.posix.join(mountRoot, share.name),
            type: "nfs",
            options: "defaults,_netdev",
            dump: 0,
            pass: 0,
        })),
    ];
}

/** Drops every line for `host`, including an earlier header under any label, then appends a fresh block. */
export function rewriteClientEntries(fstab: string, host: string, block: string[]) {
    const isOldHeader = (line: string) => line.startsWith(HEADER_PREFIX) && line.endsWith(` (${host})`);
    const kept = removeEntriesMatching(fstab, `${host}:`)
        .split("\n")
        .filter((line) => !isOldHeader(line))
        .join("\n")
        .replace(/\n+$/, "\n");

    return appendLines(kept, ["", ...block]);
}

export async function setupNfsClient(ctx: SetupContext, options: NfsClientOptions = {}) {
    const { shell, config } = ctx;
    const { label, mountRoot, shares } = config.nfs.client;
    const host = options.host ?? config.nfs.client.host;
    const { fstabPath } = config.system;
    // every fstab line mentioning `${host}:` is rewritten below
    if (!nfsHostSchema.safeParse(host).success) throw new ConfigError(`Invalid NFS host "${host}"`);

    log.info("=== NFS Client Setup ===");
    log.info(`Setting up NFS client to connect to ${label} (${host})...`);
    requireRoot(shell);

    log.step("Installing NFS client...");
    await aptInstall(shell, ["nfs-common"]);

    log.step("Creating mount points...");
    await shell.exec("mkdir", ["-p", ...shares.map((s) => path.posix.join(mountRoot, s.name))]);

    log.step("Backing up fstab...");
    backupFstab(fstabPath);

    log.step("Adding NFS mounts to fstab...");
    const block = clientFstabBlock(host, label, mountRoot, shares);
    writeFstab(fstabPath, rewriteClientEntries(readFstab(fstabPath), host, block));

    log.step("Mounting NFS shares...");
    await shell.exec("mount", ["-a"]);

    const df = await shell.exec("df", ["-h"], { quiet: true });
    const mounted = df.split("\n").filter((line) => line.includes(host));

    log.info("=== Mounted NFS Shares ===");
    for (const line of mounted) log.info(line);

    log.ok("Client Setup Complete! NFS shares are now mounted and will persist after reboot.");
    log.info("Access points:");
    for (const share of shares) {
        const local = path.posix.join(mountRoot, share.name);
        log.info(`- ${local}${share.description ? ` (${share.description})` : ""}`);
    }
    log.info(`Open in Nautilus with: nautilus ${mountRoot}/`);

    return { block, mounted };
}
