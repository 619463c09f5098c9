/***
 *
 *
 *  Archive Extraction
 *
 */

import { dirname } from "node:path"
import { ArchiveError } from "./errors"
import { directoryExists, fileExists, stripArchiveExtension } from "./path"
import { Runner, reportFailure, type CommandRunner } from "./run"
import { Logger } from "./log"

export interface Extractor {
    /**
     * Unpacks `archive` next to itself. The archive must unpack to a
     * directory named after it, e.g. `dl/linux-5.4.tar.xz` -> `dl/linux-5.4`.
     */
    untar(archive: string): Promise<string>
    /**
     * Decompresses `file.xz` into `file`, keeping the compressed copy
     */
    unxz(file: string): Promise<string>
}

export class ShellExtractor implements Extractor {

    constructor(private readonly runner: CommandRunner = Runner) {}

    public async untar(archive: string): Promise<string> {
        if (!fileExists(archive)) {
            throw new ArchiveError(`File ${archive} does not exist`)
        }

        // No spinner while tar runs: a terminal Ctrl-C must reach tar too
        Logger.info(`Decompressing ${archive}...`)
        const result = await this.runner.run("tar", ["-C", dirname(archive), "-xf", archive])
        if (result.exitCode !== 0) {
            reportFailure(result)
            throw new ArchiveError(`Failed to decompress ${archive} (tar exited with code ${result.exitCode})`)
        }
        Logger.success(`Decompressed ${archive}`)

        const dir = stripArchiveExtension(archive)
        if (dir === archive || !directoryExists(dir)) {
            throw new ArchiveError(`Archive ${archive} was expected to be decompressed as directory ${dir}`)
        }
        return dir
    }

    public async unxz(file: string): Promise<string> {
        if (!file.endsWith(".xz")) {
            throw new ArchiveError(`${file} is not an xz file`)
        }
        const result = await this.runner.run("xz", ["--decompress", "--keep", "--force", file])
        if (result.exitCode !== 0) {
            reportFailure(result)
            throw new ArchiveError(`Failed to decode Xz data at path ${file}`)
        }
        const out = file.slice(0, -".xz".length)
        if (!fileExists(out)) {
            throw new ArchiveError(`Decompressing ${file} did not produce ${out}`)
        }
        return out
    }
}
