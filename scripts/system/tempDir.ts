import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>) {
    const dir = await mkdtemp(path.join(tmpdir(), `${prefix}-`));
    try {
        return await fn(dir);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}
