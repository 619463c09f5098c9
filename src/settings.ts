/***
 *
 *
 *  Settings
 *
 *  Resolves the command-line options and the target/toolchain descriptors
 *  of the library into the settings every command works from.
 *
 */

import { realpath } from "node:fs/promises"
import { availableParallelism } from "node:os"
import { join, resolve } from "node:path"
import { ConfigurationError, FilesystemError } from "./utils/errors"
import { Logger } from "./utils/log"
import { ensureDirectory, fileExists } from "./utils/path"
import { loadTargetToml, targetTomlPath, type ComponentToml } from "./types/target-toml"
import { loadToolchainToml, type ToolchainToml } from "./types/toolchain-toml"

export type GlobalOptions = {
    library?: string
    buildDir?: string
    downloadDir?: string
    target?: string
    jobs?: string
}

export interface ComponentSettings {
    version: string
    // Absolute path to the .config file, when the target names one
    config: string | null
}

export interface Settings {
    library: string
    buildDir: string
    downloadDir: string
    // Stem of the target file
    target: string
    // Pretty name of the target
    targetName: string
    jobs: number
    toolchainName: string
    toolchain: ToolchainToml
    linux: ComponentSettings
    uboot: ComponentSettings | null
}

export function defaultJobs(): number {
    return availableParallelism() + 2
}

export function parseJobs(value: string | undefined): number {
    if (value === undefined) return defaultJobs()
    if (!/^[0-9]+$/.test(value)) {
        throw new ConfigurationError(`Invalid job number: '${value}'`)
    }
    const jobs = Number.parseInt(value, 10)
    if (jobs <= 0) {
        throw new ConfigurationError("A value of 0 jobs is meaningless")
    }
    return jobs
}

async function canonicalize(path: string): Promise<string> {
    try {
        return await realpath(path)
    } catch (err) {
        throw new FilesystemError("retrieve the canonical path to", path, err)
    }
}

/**
 * A user-provided directory is created and canonicalized, the default one is
 * used as is and created when something needs it
 */
async function resolveOutputDir(value: string | undefined, cwd: string, fallback: string): Promise<string> {
    if (value === undefined) {
        return join(cwd, fallback)
    }
    const dir = resolve(cwd, value)
    await ensureDirectory(dir)
    return canonicalize(dir)
}

function resolveComponent(library: string, component: "linux" | "uboot", toml: ComponentToml): ComponentSettings {
    if (toml.config === undefined) {
        return { version: toml.version, config: null }
    }
    const path = join(library, "configs", component, toml.version, toml.config)
    if (!fileExists(path)) {
        throw new ConfigurationError(`File ${path} does not exist`)
    }
    return { version: toml.version, config: path }
}

export async function loadSettings(options: GlobalOptions, cwd: string = process.cwd()): Promise<Settings> {
    if (!options.target) {
        throw new ConfigurationError("Target option (--target, -t) is required")
    }
    const target = options.target

    const library = options.library === undefined ? cwd : await canonicalize(resolve(cwd, options.library))
    const downloadDir = await resolveOutputDir(options.downloadDir, cwd, "download")
    const buildDir = await resolveOutputDir(options.buildDir, cwd, "build")
    const jobs = parseJobs(options.jobs)

    const targetToml = await loadTargetToml(library, target)
    Logger.info(`Using target configuration at path ${targetTomlPath(library, target)}`)
    const toolchain = await loadToolchainToml(library, targetToml.toolchain)

    return {
        library,
        buildDir,
        downloadDir,
        target,
        targetName: targetToml.name,
        jobs,
        toolchainName: targetToml.toolchain,
        toolchain,
        linux: resolveComponent(library, "linux", targetToml.linux),
        uboot: targetToml.uboot ? resolveComponent(library, "uboot", targetToml.uboot) : null,
    }
}
