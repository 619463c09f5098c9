/***
 *
 *
 *  Patch Utilities
 *
 */

import type { Dirent } from "node:fs"
import { readdir } from "node:fs/promises"
import { join } from "node:path"
import { Logger } from "./log"
import { FilesystemError, PatchError } from "./errors"
import { directoryExists } from "./path"
import { Runner, reportFailure, type CommandRunner } from "./run"

export class PatchApplier {

    constructor(private readonly runner: CommandRunner = Runner) {}

    /**
     * Applies a single diff to the tree in `workingDir`
     */
    public async patch(workingDir: string, diff: string): Promise<void> {
        Logger.debug(`Applying patch ${diff} on ${workingDir}`)
        const result = await this.runner.run("patch", ["-s", "-p1", "-i", diff], {
            cwd: workingDir,
            isolated: true,
        })
        if (result.exitCode !== 0) {
            reportFailure(result)
            throw new PatchError(`Failed to apply patch ${diff} to ${workingDir}`)
        }
    }

    /**
     * Applies every diff found in `dir`, in name order. A missing directory
     * is an empty patch set.
     */
    public async applyPatchesIn(dir: string, workingDir: string): Promise<string[]> {
        if (!directoryExists(dir)) {
            Logger.debug(`No patches in ${dir}`)
            return []
        }

        let entries: Dirent[]
        try {
            entries = await readdir(dir, { withFileTypes: true })
        } catch (err) {
            throw new FilesystemError("iterate over directory", dir, err)
        }

        const patches = entries
            .filter(entry => entry.isFile())
            .map(entry => entry.name)
            .sort()
            .map(name => join(dir, name))

        for (const patch of patches) {
            Logger.info(`Applying ${patch}`)
            await this.patch(workingDir, patch)
        }
        return patches
    }
}
