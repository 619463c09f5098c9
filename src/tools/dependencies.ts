/***
 *
 *  Collaborators shared by the component tools
 *
 */

import { HttpFetcher } from "../utils/download"
import { ShellExtractor } from "../utils/decompress"
import { PatchApplier } from "../utils/patch"
import { Runner, type CommandRunner } from "../utils/run"
import type { Interrupt } from "../utils/interrupt"
import type { EngineDependencies } from "../source/engine"

export interface ToolDependencies extends EngineDependencies {
    runner: CommandRunner
}

export function defaultDependencies(interrupt: Interrupt, runner: CommandRunner = Runner): ToolDependencies {
    return {
        fetcher: new HttpFetcher(),
        extractor: new ShellExtractor(runner),
        patcher: new PatchApplier(runner),
        interrupt,
        runner,
    }
}
