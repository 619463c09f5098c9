/***
 *
 *
 *  Logging Utilities
 *
 */

import chalk from "chalk"
import ora, { type Ora } from "ora"
import { LogSetupError } from "./errors"

export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const
export type LogLevel = typeof LOG_LEVELS[number]

const ICONS = {
    arrow: "›",
    success: "✓",
    error: "✗",
    warning: "⚠",
    debug: "○",
    trace: "·",
    info: "•",
} as const

export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find(l => l === value.toLowerCase())
    if (!level) {
        throw new LogSetupError(`Invalid log level '${value}'. Must be one of: ${LOG_LEVELS.join(", ")}`)
    }
    return level
}

export class Logger {
    static prefix = chalk.bold.cyan("tcbkit")

    private static level: LogLevel = "info"

    public static setLevel(level: LogLevel) {
        Logger.level = level
    }

    public static enabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(Logger.level)
    }

    private static format(icon: string, iconColor: (s: string) => string, message: string): string {
        return `${Logger.prefix} ${iconColor(icon)} ${message}`
    }

    public static log(message: string) {
        if (Logger.enabled("info")) {
            console.log(Logger.format(ICONS.arrow, chalk.cyan, message))
        }
    }

    public static info(message: string) {
        if (Logger.enabled("info")) {
            console.log(Logger.format(ICONS.info, chalk.blue, message))
        }
    }

    public static success(message: string) {
        if (Logger.enabled("info")) {
            console.log(Logger.format(ICONS.success, chalk.green, chalk.green(message)))
        }
    }

    public static debug(message: string) {
        if (Logger.enabled("debug")) {
            console.log(Logger.format(ICONS.debug, chalk.yellow, chalk.dim(message)))
        }
    }

    public static trace(message: string) {
        if (Logger.enabled("trace")) {
            console.log(Logger.format(ICONS.trace, chalk.white, chalk.dim(message)))
        }
    }

    public static warning(message: string) {
        if (Logger.enabled("warn")) {
            console.error(Logger.format(ICONS.warning, chalk.yellow, chalk.yellow(message)))
        }
    }

    public static error(message: string) {
        console.error(Logger.format(ICONS.error, chalk.red, chalk.red(message)))
    }

    // Subprocess output, indented under the message it belongs to
    public static raw(message: string): void {
        const indent = "       "
        for (const line of message.split("\n")) {
            if (line.trim()) {
                console.error(`${indent}${chalk.dim(line)}`)
            }
        }
    }
}

export class Spinner {
    private spinner: Ora | null = null
    private message: string

    constructor(message: string) {
        this.message = message
    }

    start(): void {
        // Below info level nothing is drawn, and in debug mode the spinner
        // would fight with the log lines
        if (!Logger.enabled("info") || Logger.enabled("debug")) {
            Logger.log(this.message)
            return
        }
        this.spinner = ora({
            text: this.message,
            // Leave stdin alone so Ctrl-C stays a terminal signal
            discardStdin: false,
            spinner: {
                interval: 80,
                frames: ["◐", "◓", "◑", "◒"].map(f => `${Logger.prefix} ${chalk.cyan(f)}`),
            },
        }).start()
    }

    stop(): void {
        if (this.spinner) {
            this.spinner.stop()
            this.spinner = null
        }
    }

    stopWithSuccess(msg: string): void {
        this.stop()
        Logger.success(msg)
    }

    stopWithError(msg: string): void {
        this.stop()
        Logger.error(msg)
    }

    updateMessage(msg: string): void {
        this.message = msg
        if (this.spinner) {
            this.spinner.text = msg
        }
    }
}
