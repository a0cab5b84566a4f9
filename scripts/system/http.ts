import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { HttpError } from "./errors.ts";
import { createReporter } from "./log.ts";

const log = createReporter("http");

export interface Http {
    text(url: string): Promise<string>;
    json(url: string): Promise<unknown>;
    bytes(url: string): Promise<Uint8Array>;
    download(url: string, dest: string): Promise<void>;
}

export function createHttp(fetchImpl: typeof fetch = fetch): Http {
    async function request(url: string) {
        log.debug("GET", { url });
        const res = await fetchImpl(url, { redirect: "follow" });
        if (!res.ok) throw new HttpError(url, res.status);
        return res;
    }

    return {
        async text(url) {
            return (await request(url)).text();
        },
        async json(url) {
            return (await request(url)).json();
        },
        async bytes(url) {
            return new Uint8Array(await (await request(url)).arrayBuffer());
        },
        async download(url, dest) {
            const res = await request(url);
            if (!res.body) throw new HttpError(url, res.status);

            // dest only appears once the body is complete
            const partial = `${dest}.part`;
            await mkdir(path.dirname(dest), { recursive: true });
            try {
                await pipeline(
                    Readable.fromWeb(res.body),
                    createWriteStream(partial),
                );
            } catch (err) {
                await rm(partial, { force: true });
                throw err;
            }
            await rename(partial, dest);
        },
    };
}
