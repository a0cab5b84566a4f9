import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./scripts/system/errors.ts";
import { detectDesktop } from "./scripts/system/desktopEnv.ts";

const partitionSchema = z.object({
    device: z.string().min(1),
    mountPoint: z.string().startsWith("/"),
    fsType: z.string().min(1),
    options: z.string().default("defaults"),
    pass: z.number().int().min(0).max(2).default(0),
    exportPath: z.string().startsWith("/"),
});

const shareSchema = z.object({
    name: z.string().regex(/^[\w.-]+$/),
    remotePath: z.string().startsWith("/"),
    description: z.string().default(""),
});

export type NfsShare = z.infer<typeof shareSchema>;

export const nfsHostSchema = z.string().ip();

const DEFAULT_PARTITIONS: z.input<typeof partitionSchema>[] = [
    {
        device: "/dev/sdc1",
        mountPoint: "/mnt/sdc1",
        fsType: "ntfs",
        options: "defaults,uid=1000,gid=1000,umask=0022",
        pass: 0,
        exportPath: "/srv/nfs/sdc1",
    },
    {
        device: "/dev/sdc2",
        mountPoint: "/mnt/sdc2",
        fsType: "ext4",
        options: "defaults",
        pass: 2,
        exportPath: "/srv/nfs/sdc2",
    },
];

const DEFAULT_SHARES: z.input<typeof shareSchema>[] = [
    { name: "sdc1", remotePath: "/srv/nfs/sdc1", description: "NTFS partition" },
    { name: "sdc2", remotePath: "/srv/nfs/sdc2", description: "Linux partition" },
    { name: "wd1tb", remotePath: "/mnt/wd1tb", description: "1TB drive" },
    { name: "home", remotePath: "/home", description: "Home directories" },
    { name: "general", remotePath: "/var/nfs/general", description: "General storage" },
];

export const configSchema = z.object({
    home: z.string({ required_error: "HOME is not set" }).startsWith("/"),
    shell: z.string().default("/bin/bash"),
    path: z.string().default(""),
    desktop: z.string().default("unknown"),
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
    logFile: z.string().optional(),
    paths: z.object({
        installRoot: z.string(),
        dataDir: z.string(),
        applicationsDir: z.string(),
        iconsDir: z.string(),
        mimeDir: z.string(),
        extensionsDir: z.string(),
        cacheDir: z.string(),
    }).partial().default({}),
    system: z.object({
        fstabPath: z.string().default("/etc/fstab"),
        exportsPath: z.string().default("/etc/exports"),
        libDir: z.string().default("/usr/lib/x86_64-linux-gnu"),
        osReleasePath: z.string().default("/etc/os-release"),
        systemIconTheme: z.string().default("/usr/share/icons/Yaru"),
    }).default({}),
    cursor: z.object({
        apiUrl: z.string().url().default("https://www.cursor.com/api/download?platform=linux-x64&releaseTrack=stable"),
        iconUrl: z.string().url().default("https://us1.discourse-cdn.com/flex020/uploads/cursor1/original/2X/a/a4f78589d63edd61a2843306f8e11bad9590f0ca.png"),
    }).default({}),
    bambuStudio: z.object({
        repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/).default("bambulab/BambuStudio"),
        iconSvgUrl: z.string().url().default("https://raw.githubusercontent.com/bambulab/BambuStudio/master/resources/images/BambuStudio.svg"),
        iconPngUrl: z.string().url().default("https://github.com/bambulab/BambuStudio/raw/master/resources/images/BambuStudio_128.png"),
    }).default({}),
    cura: z.object({
        appImageUrl: z.string().url().default("https://github.com/Ultimaker/Cura/releases/download/5.9.0/UltiMaker-Cura-5.9.0-linux-X64.AppImage"),
        iconUrl: z.string().url().default("https://raw.githubusercontent.com/Ultimaker/Cura/master/resources/images/cura-icon.png"),
    }).default({}),
    rubymine: z.object({
        productCode: z.string().default("RM"),
        releasesApi: z.string().url().default("https://data.services.jetbrains.com/products/releases"),
    }).default({}),
    gnomeExtension: z.object({
        uuid: z.string().default("dock-from-dash@fthx.github.com"),
        pk: z.coerce.number().int().positive().default(4703),
        siteUrl: z.string().url().default("https://extensions.gnome.org"),
    }).default({}),
    nfs: z.object({
        server: z.object({
            partitions: z.array(partitionSchema).default(DEFAULT_PARTITIONS),
            exportClients: z.string().default("192.168.15.0/24(rw,sync,no_subtree_check)"),
        }).default({}),
        client: z.object({
            host: nfsHostSchema.default("192.168.15.53"),
            label: z.string().default("fabionas"),
            mountRoot: z.string().startsWith("/").default("/mnt/nfs"),
            shares: z.array(shareSchema).min(1).default(DEFAULT_SHARES),
        }).default({}),
    }).default({}),
    workstation: z.object({
        projectsDir: z.string().optional(),
        filesDir: z.string().optional(),
        postgresPassword: z.string().default("postgres"),
    }).default({}),
});

type RawConfig = z.infer<typeof configSchema>;

function resolveConfig(raw: RawConfig, cwd: string) {
    const local = path.join(raw.home, ".local");

    return {
        ...raw,
        paths: {
            installRoot: raw.paths.installRoot ?? path.join(local, "bin"),
            dataDir: raw.paths.dataDir ?? path.join(local, "share"),
            applicationsDir: raw.paths.applicationsDir ?? path.join(local, "share/applications"),
            iconsDir: raw.paths.iconsDir ?? path.join(local, "share/icons"),
            mimeDir: raw.paths.mimeDir ?? path.join(local, "share/mime"),
            extensionsDir: raw.paths.extensionsDir ?? path.join(local, "share/gnome-shell/extensions"),
            cacheDir: raw.paths.cacheDir ?? path.join(raw.home, ".cache"),
        },
        workstation: {
            ...raw.workstation,
            projectsDir: raw.workstation.projectsDir ?? path.join(raw.home, "software-projects"),
            filesDir: raw.workstation.filesDir ?? cwd,
        },
    };
}

export type Config = ReturnType<typeof resolveConfig>;

export interface LoadConfigOptions {
    /** Path to a JSON file, or the JSON itself. */
    source?: string;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

export function readConfigSource(source: string): Record<string, unknown> {
    let text = source;
    let origin = "inline JSON";

    if (existsSync(source)) {
        try {
            text = readFileSync(source, "utf8");
        } catch (err) {
            throw new ConfigError(`Cannot read config file ${source}: ${errorMessage(err)}`, { cause: err });
        }
        origin = source;
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch {
        throw new ConfigError(`"${source}" is neither a readable file nor valid JSON`);
    }

    const record = z.record(z.unknown()).safeParse(data);
    if (!record.success) throw new ConfigError(`${origin} must contain a JSON object`);

    return record.data;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
    const env = options.env ?? process.env;
    const source = options.source ?? env.DESK_SETUP_CONFIG;
    const overrides = source ? readConfigSource(source) : {};

    const parsed = configSchema.safeParse({
        home: env.HOME,
        shell: env.SHELL || undefined,
        path: env.PATH,
        desktop: detectDesktop(env),
        logLevel: env.LOG_LEVEL || undefined,
        logFile: env.DESK_SETUP_LOG_FILE || undefined,
        ...overrides,
    });

    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    return resolveConfig(parsed.data, options.cwd ?? process.cwd());
}

export function defaultLogFile(config: Config) {
    return path.join(config.paths.cacheDir, "desk-setup", "desk-setup.log");
}
