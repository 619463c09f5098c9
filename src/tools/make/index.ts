/***
 *
 *  Build Driver
 *
 *  Runs make out-of-tree: sources in the download directory, objects and
 *  .config in the build directory.
 *
 */

import { Logger } from "../../utils/log"
import { SubprocessError } from "../../utils/errors"
import { Runner, type CommandRunner } from "../../utils/run"

export interface MakeInvocation {
    sourceDir: string
    buildDir: string
    arch: string
    crossCompile: string
    jobs: number
}

export function makeArgs(invocation: MakeInvocation, target: string, variables: string[] = []): string[] {
    return [
        "-C", invocation.sourceDir,
        `-j${invocation.jobs}`,
        `O=${invocation.buildDir}`,
        `ARCH=${invocation.arch}`,
        `CROSS_COMPILE=${invocation.crossCompile}`,
        ...variables,
        "--",
        target,
    ]
}

export class BuildDriver {

    constructor(private readonly runner: CommandRunner = Runner) {}

    public async make(invocation: MakeInvocation, target: string, variables: string[] = []): Promise<void> {
        Logger.info(`Running make target '${target}'`)
        const result = await this.runner.run("make", makeArgs(invocation, target, variables), { interactive: true })
        if (result.exitCode !== 0) {
            throw new SubprocessError(`Failed to run the make target '${target}' (exit code ${result.exitCode})`)
        }
        Logger.success(`make ${target} completed`)
    }
}
