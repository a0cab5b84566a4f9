import { checkbox, confirm } from "@inquirer/prompts";

export interface Choice<T> {
    name: string;
    value: T;
    checked?: boolean;
}

export interface Prompter {
    confirm(message: string, defaultValue?: boolean): Promise<boolean>;
    checkbox<T>(message: string, choices: Choice<T>[]): Promise<T[]>;
}

export const terminalPrompter: Prompter = {
    confirm: (message, defaultValue = false) => confirm({ message, default: defaultValue }),
    checkbox: (message, choices) => checkbox({ message, choices }),
};

/** Ctrl+C inside an inquirer prompt rejects with this error name. */
export function isPromptCancel(err: unknown) {
    return err instanceof Error && err.name === "ExitPromptError";
}
