/***
 *
 *
 *  Running Utilities
 *
 */

import { spawn, type StdioOptions } from "node:child_process"
import { constants } from "node:os"
import { Logger } from "./log"
import { SubprocessError } from "./errors"

export interface RunOptions {
    cwd?: string
    env?: NodeJS.ProcessEnv
    // Stream the child's output to the terminal instead of capturing it
    inheritOutput?: boolean
    // Hand the terminal over to the child, stdin included (menuconfig)
    interactive?: boolean
    // Start the child in its own process group, so a terminal Ctrl-C only
    // reaches us and the interrupt guard decides what happens
    isolated?: boolean
}

export interface RunResult {
    exitCode: number
    stdout: string
    stderr: string
}

export interface CommandRunner {
    run(command: string, args: string[], options?: RunOptions): Promise<RunResult>
}

export function formatCommand(command: string, args: string[]): string {
    return [command, ...args].join(" ")
}

export class ProcessRunner implements CommandRunner {

    public run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
        Logger.debug(`$ ${formatCommand(command, args)}${options.cwd ? ` (in ${options.cwd})` : ""}`)

        const stdio: StdioOptions = options.interactive
            ? "inherit"
            : options.inheritOutput ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"]

        const proc = spawn(command, args, {
            cwd: options.cwd ?? process.cwd(),
            env: options.env ?? process.env,
            stdio,
            detached: options.isolated ?? false,
        })

        let stdout = ""
        let stderr = ""

        if (proc.stdout) {
            proc.stdout.on("data", (data: Buffer) => {
                stdout += data.toString()
            })
        }

        if (proc.stderr) {
            proc.stderr.on("data", (data: Buffer) => {
                stderr += data.toString()
            })
        }

        return new Promise((resolve, reject) => {
            proc.on("close", (code, signal) => {
                const exitCode = code ?? 128 + (signal ? constants.signals[signal] : 0)
                if (signal) {
                    Logger.debug(`${command} was terminated by ${signal}`)
                }
                resolve({ exitCode, stdout, stderr })
            })

            proc.on("error", (err) => {
                reject(new SubprocessError(`Failed to run process '${command}': ${err.message}`, { cause: err }))
            })
        })
    }
}

/**
 * Dumps what a failed child printed, so the single error line that follows
 * has some context
 */
export function reportFailure(result: RunResult): void {
    if (result.stderr.trim()) {
        Logger.raw(result.stderr)
    }
    if (result.stdout.trim()) {
        Logger.raw(result.stdout)
    }
}

export const Runner: CommandRunner = new ProcessRunner()
