import { existsSync, readFileSync, writeFileSync } from "node:fs";
import type { SetupContext } from "../../types.ts";
import { requireRoot } from "../system/exec.ts";
import { createReporter } from "../system/log.ts";
import { aptInstall } from "../system/packages.ts";
import { appendLines, backupFstab, formatFstabEntry, hasEntry, readFstab, writeFstab } from "../system/fstab.ts";

const log = createReporter("nfs-server");

/**
 * Mounts each partition, bind-mounts it under its export path and exports
 * that path. Lines already present are left alone.
 */
/** /etc/exports separates the path from its clients with any whitespace. */
export function isExported(exports: string, exportPath: string) {
    return exports.split("\n").some((line) => line.startsWith(exportPath) && /^\s/.test(line.slice(exportPath.length)));
}

export async function setupNfsServer(ctx: SetupContext) {
    const { shell, config } = ctx;
    const { partitions, exportClients } = config.nfs.server;
    const { fstabPath, exportsPath } = config.system;

    log.info("=== NFS Server Setup ===");
    requireRoot(shell);

    log.step("Installing NFS server packages...");
    await aptInstall(shell, ["nfs-kernel-server", "nfs-common"]);

    log.step("Creating mount points and export directories...");
    await shell.exec("mkdir", ["-p", ...partitions.map((p) => p.mountPoint)]);
    await shell.exec("mkdir", ["-p", ...partitions.map((p) => p.exportPath)]);

    log.step(`Adding persistent mounts to ${fstabPath}...`);
    backupFstab(fstabPath);

    let fstab = readFstab(fstabPath);
    const fstabAdded: string[] = [];
    const add = (needle: string, line: string) => {
        if (hasEntry(fstab, needle)) return;
        fstab = appendLines(fstab, [line]);
        fstabAdded.push(line);
        log.ok(`Added to fstab: ${line}`);
    };

    for (const p of partitions) {
        add(p.device, formatFstabEntry({
            source: p.device,
            mountPoint: p.mountPoint,
            type: p.fsType,
            options: p.options,
            dump: 0,
            pass: p.pass,
        }));
    }

    for (const p of partitions) {
        add(p.exportPath, formatFstabEntry({
            source: p.mountPoint,
            mountPoint: p.exportPath,
            type: "none",
            options: "bind",
            dump: 0,
            pass: 0,
        }));
    }

    writeFstab(fstabPath, fstab);

    let exports = existsSync(exportsPath) ? readFileSync(exportsPath, "utf8") : "";
    const exportsAdded: string[] = [];
    for (const p of partitions) {
        if (isExported(exports, p.exportPath)) continue;
        const line = `${p.exportPath} ${exportClients}`;
        exports = appendLines(exports, [line]);
        exportsAdded.push(line);
    }
    writeFileSync(exportsPath, exports);
    if (exportsAdded.length) log.ok(`Exported: ${exportsAdded.join(", ")}`);

    log.step("Mounting filesystems...");
    await shell.exec("mount", ["-a"]);

    log.step("Publishing exports...");
    await shell.exec("exportfs", ["-ra"]);
    await shell.exec("systemctl", ["enable", "nfs-kernel-server"]);
    await shell.exec("systemctl", ["restart", "nfs-kernel-server"]);

    log.ok("NFS server setup complete!");
    return { fstabAdded, exportsAdded };
}
