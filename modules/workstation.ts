import type { SetupContext } from "../types.ts";
import { errorMessage } from "../scripts/system/errors.ts";
import { createReporter } from "../scripts/system/log.ts";
import {
    installBaseSetup,
    installBrowsers,
    installCuraTask,
    installDocker,
    installIdes,
    installLastpass,
    installMiseRuby,
    installPostgres,
} from "../scripts/workstation/tasks.ts";

const log = createReporter("workstation");

export type TaskId = "base" | "mise-ruby" | "postgres" | "docker" | "browsers" | "ides" | "lastpass" | "cura";

interface WorkstationTask {
    number: number;
    id: TaskId;
    name: string;
    run: (ctx: SetupContext) => Promise<void>;
}

export const allTasks: WorkstationTask[] = [
    {
        number: 1,
        id: "base",
        name: "Base Setup (includes software-projects directory, SSH key, bash_git config, and Flameshot)",
        run: installBaseSetup,
    },
    { number: 2, id: "mise-ruby", name: "Mise and Latest Ruby (Includes Node.js)", run: installMiseRuby },
    { number: 3, id: "postgres", name: "PostgreSQL", run: installPostgres },
    { number: 4, id: "docker", name: "Docker", run: installDocker },
    { number: 5, id: "browsers", name: "Browsers (Brave & Chrome)", run: installBrowsers },
    { number: 6, id: "ides", name: "VS Code & RubyMine", run: installIdes },
    { number: 7, id: "lastpass", name: "LastPass", run: installLastpass },
    { number: 8, id: "cura", name: "Install Cura", run: installCuraTask },
];

const ALL = 9;
const EXIT = 10;

export interface Selection {
    ids: TaskId[];
    exit: boolean;
    invalid: string[];
}

/**
 * Reads a menu answer such as `1, 3,5`. Anything after the exit option is
 * ignored, the same way the menu stops reading once it exits.
 */
export function parseSelection(input: string): Selection {
    const ids: TaskId[] = [];
    const invalid: string[] = [];
    const add = (id: TaskId) => {
        if (!ids.includes(id)) ids.push(id);
    };

    for (const raw of input.split(",")) {
        const token = raw.replace(/\s+/g, "");
        if (!token) continue;

        const number = /^\d+$/.test(token) ? Number(token) : NaN;
        if (number === EXIT) return { ids, exit: true, invalid };

        if (number === ALL) {
            allTasks.forEach((task) => add(task.id));
            continue;
        }

        const task = allTasks.find((t) => t.number === number);
        if (task) add(task.id);
        else invalid.push(token);
    }

    return { ids, exit: false, invalid };
}

/** Runs every task even when an earlier one fails. Returns the ones that failed. */
export async function runTasks(ctx: SetupContext, ids: TaskId[]) {
    const failed: TaskId[] = [];

    for (const id of ids) {
        const task = allTasks.find((t) => t.id === id);
        if (!task) continue;

        try {
            await task.run(ctx);
            log.ok(`${task.name} done`);
        } catch (err) {
            log.error(`${task.name} failed: ${errorMessage(err)}`);
            failed.push(id);
        }
    }

    return failed;
}

export interface WorkstationOptions {
    /** Menu answer to run once, without prompting. */
    select?: string;
}

export async function runWorkstation(ctx: SetupContext, options: WorkstationOptions = {}) {
    const failed: TaskId[] = [];

    if (options.select !== undefined) {
        const selection = parseSelection(options.select);
        selection.invalid.forEach((token) => log.warn(`Invalid option: ${token}`));
        failed.push(...await runTasks(ctx, selection.ids));
        if (selection.exit) log.note("Exiting...");
        return { failed };
    }

    while (true) {
        const picked = await ctx.prompt.checkbox("Select options to install", [
            { name: "Install All", value: "all" },
            ...allTasks.map((task) => ({ name: `${task.number}) ${task.name}`, value: task.id })),
        ]);

        if (!picked.length) break;

        const ids = picked.includes("all") ? allTasks.map((t) => t.id) : allTasks.map((t) => t.id).filter((id) => picked.includes(id));
        for (const id of await runTasks(ctx, ids)) {
            if (!failed.includes(id)) failed.push(id);
        }

        if (!await ctx.prompt.confirm("Install anything else?", false)) break;
    }

    log.note("Exiting...");
    return { failed };
}
