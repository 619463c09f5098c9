/***
 *
 *  Cross-compilation Toolchain
 *
 */

import { join } from "node:path"
import type { Settings } from "../../settings"
import type { Fetcher } from "../../utils/download"
import type { Extractor } from "../../utils/decompress"
import { ConfigurationError } from "../../utils/errors"
import { Logger } from "../../utils/log"
import { directoryExists, ensureDirectory, stripArchiveExtension, urlBasename } from "../../utils/path"

export class Toolchain {
    readonly url: string
    readonly archive: string
    // Where the archive unpacks to
    readonly dir: string
    // Full CROSS_COMPILE prefix, e.g. <dir>/bin/arm-linux-gnueabihf-
    readonly crossCompile: string

    private readonly downloadDir: string

    constructor(
        settings: Pick<Settings, "downloadDir" | "toolchain">,
        private readonly fetcher: Fetcher,
        private readonly extractor: Extractor
    ) {
        this.url = settings.toolchain.url
        this.downloadDir = settings.downloadDir
        this.archive = join(settings.downloadDir, urlBasename(this.url))
        this.dir = stripArchiveExtension(this.archive)
        if (this.dir === this.archive) {
            throw new ConfigurationError(`The toolchain URL ${this.url} does not point to a tar archive`)
        }
        this.crossCompile = join(this.dir, settings.toolchain.cross_compile)
    }

    /**
     * Downloads and unpacks the toolchain, unless it already was
     */
    public async fetch(): Promise<void> {
        if (directoryExists(this.dir)) {
            Logger.debug(`Toolchain already available in ${this.dir}`)
            return
        }
        Logger.info(`Downloading toolchain from ${this.url}`)
        await ensureDirectory(this.downloadDir)
        await this.fetcher.download(this.url, this.archive)
        await this.extractor.untar(this.archive)
    }
}
