import { Command, InvalidArgumentError } from "commander";
import { defaultLogFile, loadConfig, nfsHostSchema } from "./config.ts";
import type { SetupContext } from "./types.ts";
import { isPromptCancel, terminalPrompter } from "./modules/prompt.ts";
import { runWorkstation } from "./modules/workstation.ts";
import { createSystemShell } from "./scripts/system/exec.ts";
import { createHttp } from "./scripts/system/http.ts";
import { errorMessage } from "./scripts/system/errors.ts";
import { configureLogging, createReporter } from "./scripts/system/log.ts";
import { installCursor } from "./scripts/apps/cursor.ts";
import { installBambuStudio } from "./scripts/apps/bambuStudio.ts";
import { installCura } from "./scripts/apps/cura.ts";
import { installRubymine } from "./scripts/apps/rubymine.ts";
import { installGnomeExtension } from "./scripts/apps/gnomeExtension.ts";
import { setupNfsServer } from "./scripts/nfs/server.ts";
import { setupNfsClient } from "./scripts/nfs/client.ts";

const log = createReporter("cli");

export interface GlobalOptions {
    config?: string;
    debug?: boolean;
}

export type ContextFactory = (options: GlobalOptions) => SetupContext;

export const createSystemContext: ContextFactory = (options) => {
    const config = loadConfig({ source: options.config });

    configureLogging({
        file: config.logFile ?? (options.debug ? defaultLogFile(config) : undefined),
        level: options.debug ? "debug" : config.logLevel,
    });

    return { config, shell: createSystemShell(), http: createHttp(), prompt: terminalPrompter };
};

function parsePositiveInt(value: string) {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
    return n;
}

function parseHost(value: string) {
    if (!nfsHostSchema.safeParse(value).success) throw new InvalidArgumentError("Expected an IP address.");
    return value;
}

export function createProgram(createContext: ContextFactory = createSystemContext) {
    const program = new Command();

    program
        .name("desk-setup")
        .description("Provision an Ubuntu desktop workstation")
        .version("0.1.0")
        .option("-c, --config <file|json>", "JSON configuration file, or the JSON itself")
        .option("-d, --debug", "Write a debug log")
        .showHelpAfterError();

    /** Failures print `[ X ] message` and set exit code 1. */
    const run = async (operation: (ctx: SetupContext) => Promise<unknown>) => {
        try {
            await operation(createContext(program.opts<GlobalOptions>()));
        } catch (err) {
            if (isPromptCancel(err)) log.warn("Cancelled by user.");
            else log.error(errorMessage(err));
            process.exitCode = 1;
        }
    };

    program
        .command("cursor")
        .description("Install or update the Cursor editor")
        .option("-f, --force", "Download even when the installed version is current")
        .action((opts: { force?: boolean }) => run((ctx) => installCursor(ctx, { force: opts.force })));

    program
        .command("bambu-studio")
        .description("Install Bambu Studio and associate STL files with it")
        .option("-u, --url <url>", "Download from this zip or AppImage URL instead of the latest release")
        .option("--system-icons", "Also replace the STL icons of the system icon theme")
        .action((opts: { url?: string; systemIcons?: boolean }) =>
            run((ctx) => installBambuStudio(ctx, { url: opts.url, systemIcons: opts.systemIcons }))
        );

    program
        .command("cura")
        .description("Install Ultimaker Cura")
        .option("--appimage-url <url>", "AppImage to download")
        .option("--icon-url <url>", "Icon to download")
        .action((opts: { appimageUrl?: string; iconUrl?: string }) =>
            run((ctx) => installCura(ctx, { appImageUrl: opts.appimageUrl, iconUrl: opts.iconUrl }))
        );

    program
        .command("rubymine")
        .description("Install or update RubyMine")
        .option("-y, --yes", "Reinstall without asking when already up to date")
        .action((opts: { yes?: boolean }) => run((ctx) => installRubymine(ctx, { yes: opts.yes })));

    program
        .command("gnome-extension")
        .alias("dock-from-dash")
        .description("Install a GNOME Shell extension from extensions.gnome.org")
        .option("--uuid <uuid>", "Extension uuid")
        .option("--id <pk>", "Extension id on extensions.gnome.org", parsePositiveInt)
        .action((opts: { uuid?: string; id?: number }) =>
            run((ctx) => installGnomeExtension(ctx, { uuid: opts.uuid, pk: opts.id }))
        );

    program
        .command("nfs-server")
        .description("Mount local partitions and export them over NFS (root)")
        .action(() => run(setupNfsServer));

    program
        .command("nfs-client")
        .description("Mount the NAS shares over NFS (root)")
        .option("--host <ip>", "NFS server address", parseHost)
        .action((opts: { host?: string }) => run((ctx) => setupNfsClient(ctx, { host: opts.host })));

    program
        .command("workstation")
        .description("Developer workstation setup menu")
        .option("-s, --select <list>", "Comma separated menu options to run without prompting, e.g. 1,3,5")
        .action((opts: { select?: string }) =>
            run(async (ctx) => {
                const { failed } = await runWorkstation(ctx, { select: opts.select });
                if (failed.length) {
                    log.error(`Failed: ${failed.join(", ")}`);
                    process.exitCode = 1;
                }
            })
        );

    return program;
}
