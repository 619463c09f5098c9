/***
 *
 *
 *  Linux Kernel Flavor
 *
 *  Sources come from kernel.org: a base `linux-M.N.tar.xz` archive, then one
 *  xz-compressed diff per point release.
 *
 */

import { join } from "node:path"
import type { Settings } from "../settings"
import { ConfigurationError, ConsistencyError } from "../utils/errors"
import type { ComponentFlavor, Increment } from "./component"
import { KernelVersion } from "./version"

export function kernelOrgBaseUrl(version: KernelVersion): string {
    return `https://cdn.kernel.org/pub/linux/kernel/v${version.major}.x/`
}

/**
 * Upstream publishes `patch-M.N.1.xz` against the base release, and
 * `incr/patch-M.N.P-(P+1).xz` between two point releases
 */
export function nextPatch(baseUrl: string, version: KernelVersion): Increment<KernelVersion> {
    const next = version.next()
    if (version.micro === 0) {
        const file = `patch-${next.toString()}.xz`
        return { url: new URL(file, baseUrl).href, file, next }
    }
    const file = `patch-${version.toString()}-${next.micro}.xz`
    return { url: new URL(`incr/${file}`, baseUrl).href, file, next }
}

/** Directory holding the local patches of `version`: `M.N` for the base release, `M.N.P` after */
export function localPatchDirName(version: KernelVersion): string {
    return version.micro === 0 ? version.series : version.toString()
}

export class LinuxFlavor implements ComponentFlavor<KernelVersion> {
    readonly name = "linux"
    readonly label = "Linux"

    readonly downloadDir: string
    readonly sourceDir: string
    readonly markerFile: string
    readonly journalFile: string
    readonly archiveUrl: string
    readonly archiveFile: string
    readonly buildDir: string
    readonly configFile: string | null
    readonly initialVersion: KernelVersion

    private readonly baseUrl: string
    private readonly patchesDir: string

    constructor(settings: Pick<Settings, "downloadDir" | "buildDir" | "library" | "target" | "linux">) {
        const configured = KernelVersion.parse(settings.linux.version)
        if (configured.micro !== 0 || settings.linux.version.split(".").length !== 2) {
            throw new ConfigurationError(`The Linux version must be of format 'X.Y'. Found ${settings.linux.version}`)
        }

        const stem = `linux-${configured.series}`
        this.initialVersion = configured
        this.baseUrl = kernelOrgBaseUrl(configured)
        this.downloadDir = settings.downloadDir
        this.sourceDir = join(settings.downloadDir, stem)
        this.markerFile = join(settings.downloadDir, `${stem}.version`)
        this.journalFile = join(settings.downloadDir, `${stem}.journal`)
        this.archiveFile = `${stem}.tar.xz`
        this.archiveUrl = new URL(this.archiveFile, this.baseUrl).href
        this.buildDir = join(settings.buildDir, `${stem}-${settings.target}`)
        this.configFile = settings.linux.config
        this.patchesDir = join(settings.library, "patches", "linux")
    }

    public parseVersion(text: string): KernelVersion {
        return KernelVersion.parse(text)
    }

    public renderVersion(version: KernelVersion): string {
        return version.toString()
    }

    public validateVersion(version: KernelVersion): void {
        if (!version.sameSeries(this.initialVersion)) {
            throw new ConsistencyError(
                `Version file ${this.markerFile} records ${version.toString()}, ` +
                `which is not part of the ${this.initialVersion.series} series`
            )
        }
    }

    public nextIncrement(version: KernelVersion): Increment<KernelVersion> {
        return nextPatch(this.baseUrl, version)
    }

    public patchSetDir(version: KernelVersion): string {
        return join(this.patchesDir, localPatchDirName(version))
    }
}
