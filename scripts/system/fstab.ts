import { copyFileSync, readFileSync, writeFileSync } from "node:fs";
import { createReporter } from "./log.ts";

const log = createReporter("fstab");

export interface FstabEntry {
    source: string;
    mountPoint: string;
    type: string;
    options: string;
    dump: number;
    pass: number;
}

export function formatFstabEntry(entry: FstabEntry) {
    return `${entry.source} ${entry.mountPoint} ${entry.type} ${entry.options} ${entry.dump} ${entry.pass}`;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `<path>.backup.YYYYMMDD_HHMMSS`, local time. */
export function backupPath(fstabPath: string, now = new Date()) {
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `${fstabPath}.backup.${date}_${time}`;
}

export function backupFstab(fstabPath: string, now = new Date()) {
    const target = backupPath(fstabPath, now);
    copyFileSync(fstabPath, target);
    log.ok(`Backed up ${fstabPath} to ${target}`);
    return target;
}

export function hasEntry(content: string, needle: string) {
    return content.split("\n").some((line) => line.includes(needle));
}

export function removeEntriesMatching(content: string, needle: string) {
    return content.split("\n").filter((line) => !line.includes(needle)).join("\n");
}

export function appendLines(content: string, lines: string[]) {
    if (!lines.length) return content;
    const base = content === "" || content.endsWith("\n") ? content : `${content}\n`;
    return `${base}${lines.join("\n")}\n`;
}

export function readFstab(fstabPath: string) {
    return readFileSync(fstabPath, "utf8");
}

export function writeFstab(fstabPath: string, content: string) {
    writeFileSync(fstabPath, content);
}
