import type { Config } from "./config.ts";
import type { Prompter } from "./modules/prompt.ts";
import type { Shell } from "./scripts/system/exec.ts";
import type { Http } from "./scripts/system/http.ts";

/** Everything an installer needs from the outside world. */
export interface SetupContext {
    config: Config;
    shell: Shell;
    http: Http;
    prompt: Prompter;
}

export interface AppRelease {
    version: string;
    downloadUrl: string;
}
