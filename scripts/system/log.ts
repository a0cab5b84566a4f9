import pino from "pino";
import type { Logger } from "pino";
import pc from "picocolors";

let root: Logger = pino({ level: "silent" });

/**
 * Console output is always on. The structured log only exists when a file is
 * configured, so a plain run leaves nothing behind.
 */
export function configureLogging({ file, level }: { file?: string; level?: string }) {
    root = file
        ? pino(
            { name: "desk-setup", level: level ?? "info" },
            pino.destination({ dest: file, mkdir: true, sync: true }),
        )
        : pino({ level: "silent" });
}

export interface Reporter {
    step(message: string): void;
    ok(message: string): void;
    info(message: string): void;
    note(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    debug(message: string, data?: Record<string, unknown>): void;
}

export function createReporter(module: string): Reporter {
    const logger = () => root.child({ module });

    return {
        step(message) {
            console.log(pc.green(`> ${message}`));
            logger().info(message);
        },
        ok(message) {
            console.log(pc.green(`[ OK ] ${message}`));
            logger().info(message);
        },
        info(message) {
            console.log(message);
            logger().info(message);
        },
        note(message) {
            console.log(pc.cyan(`[ i ] ${message}`));
            logger().info(message);
        },
        warn(message) {
            console.warn(pc.yellow(`[ ! ] ${message}`));
            logger().warn(message);
        },
        error(message) {
            console.error(pc.red(`[ X ] ${message}`));
            logger().error(message);
        },
        debug(message, data) {
            logger().debug(data ?? {}, message);
        },
    };
}
