/***
 *
 *
 *  U-Boot Flavor
 *
 *  U-Boot releases are plain archives with no incremental patches, and a
 *  version such as "2020.04" is kept exactly as written.
 *
 */

import { join } from "node:path"
import type { Settings } from "../settings"
import { BadVersionFormatError, ConfigurationError, ConsistencyError } from "../utils/errors"
import type { ComponentFlavor } from "./component"

export const UBOOT_MIRROR = "https://ftp.denx.de/pub/u-boot/"

// 2020.04, 2023.10-rc2, and the old point releases such as 2013.01.01
const UBOOT_VERSION = /^[0-9]{4}\.[0-9]{2}(\.[0-9]+)?(-rc[0-9]+)?$/

export function parseUbootVersion(text: string): string {
    if (!UBOOT_VERSION.test(text)) {
        throw new BadVersionFormatError(text, "a U-Boot release such as 'YYYY.MM', 'YYYY.MM.P' or 'YYYY.MM-rcN'")
    }
    return text
}

export class UbootFlavor implements ComponentFlavor<string> {
    readonly name = "uboot"
    readonly label = "U-Boot"

    readonly downloadDir: string
    readonly sourceDir: string
    readonly markerFile: string
    readonly journalFile = null
    readonly archiveUrl: string
    readonly archiveFile: string
    readonly buildDir: string
    readonly configFile: string | null
    readonly initialVersion: string

    private readonly patchesDir: string

    constructor(settings: Pick<Settings, "downloadDir" | "buildDir" | "library" | "target" | "uboot">) {
        if (!settings.uboot) {
            throw new ConfigurationError("The target does not describe a U-Boot component")
        }
        const version = parseUbootVersion(settings.uboot.version)
        const stem = `u-boot-${version}`

        this.initialVersion = version
        this.downloadDir = settings.downloadDir
        this.sourceDir = join(settings.downloadDir, stem)
        this.markerFile = join(settings.downloadDir, `${stem}.version`)
        this.archiveFile = `${stem}.tar.bz2`
        this.archiveUrl = new URL(this.archiveFile, UBOOT_MIRROR).href
        this.buildDir = join(settings.buildDir, `${stem}-${settings.target}`)
        this.configFile = settings.uboot.config
        this.patchesDir = join(settings.library, "patches", "uboot")
    }

    public parseVersion(text: string): string {
        return parseUbootVersion(text)
    }

    public renderVersion(version: string): string {
        return version
    }

    public validateVersion(version: string): void {
        if (version !== this.initialVersion) {
            throw new ConsistencyError(`Version file ${this.markerFile} records ${version}, expected ${this.initialVersion}`)
        }
    }

    public nextIncrement(): null {
        return null
    }

    public patchSetDir(version: string): string {
        return join(this.patchesDir, version)
    }
}
