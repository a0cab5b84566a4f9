export class DeskSetupError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class CommandError extends DeskSetupError {
    constructor(
        readonly command: string,
        readonly args: string[],
        readonly exitCode: number | null,
        readonly stderr: string,
    ) {
        super(`Failed to run: ${[command, ...args].join(" ")}${stderr.trim() ? `\n--- STDERR ---\n${stderr.trim()}` : ""}`);
    }
}

export class HttpError extends DeskSetupError {
    constructor(readonly url: string, readonly status: number) {
        super(`Request to ${url} failed with HTTP ${status}`);
    }
}

/** The vendor API answered, but without the fields we need. */
export class ReleaseLookupError extends DeskSetupError { }

export class PreconditionError extends DeskSetupError { }

export class ConfigError extends DeskSetupError { }

export function errorMessage(err: unknown) {
    return err instanceof Error ? err.message : String(err);
}
