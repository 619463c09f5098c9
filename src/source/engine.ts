/***
 *
 *
 *  Source Tree Lifecycle Engine
 *
 *  Brings a source tree to the latest upstream release of its series, with
 *  the local patches applied, and keeps the version marker in step with it:
 *
 *  - the marker exists only once the tree is fully materialized and patched
 *    to the version it records;
 *  - the marker is the last thing written whenever the tree changes;
 *  - every mutation happens with the interrupt guard held.
 *
 *  A source directory without a marker, or with an upgrade journal left
 *  behind, is a tree in an unknown state. It is never touched again: the
 *  user has to remove it.
 *
 */

import { join, resolve } from "node:path"
import { Logger } from "../utils/log"
import { ArchiveError, CorruptedSourceDirError, InterruptedUpgradeError } from "../utils/errors"
import { copyInto, ensureDirectory, pathExists } from "../utils/path"
import type { Fetcher } from "../utils/download"
import type { Extractor } from "../utils/decompress"
import type { PatchApplier } from "../utils/patch"
import type { Interrupt } from "../utils/interrupt"
import type { ComponentFlavor } from "./component"
import { UpgradeJournal, VersionMarker } from "./marker"

export type TreeState = "absent" | "present" | "corrupt"

export interface EngineDependencies {
    fetcher: Fetcher
    extractor: Extractor
    patcher: PatchApplier
    interrupt: Interrupt
}

export class SourceTreeEngine<V> {
    private readonly marker: VersionMarker<V>
    private readonly journal: UpgradeJournal | null
    private version: V

    constructor(
        readonly flavor: ComponentFlavor<V>,
        private readonly deps: EngineDependencies
    ) {
        this.marker = new VersionMarker(flavor.markerFile, flavor, flavor.label)
        this.journal = flavor.journalFile ? new UpgradeJournal(flavor.journalFile) : null
        this.version = flavor.initialVersion
    }

    public get currentVersion(): V {
        return this.version
    }

    public state(): TreeState {
        if (this.journal?.exists()) return "corrupt"
        if (this.marker.exists()) return "present"
        return pathExists(this.flavor.sourceDir) ? "corrupt" : "absent"
    }

    /**
     * Reads the version the tree was last materialized at. Fails when the
     * sources were never fetched.
     */
    public async loadVersion(): Promise<V> {
        const version = await this.marker.read()
        this.flavor.validateVersion(version)
        this.version = version
        return version
    }

    /**
     * Whether fetching would change the tree. Without a marker the sources
     * were never fetched, so there is technically an update (from nothing).
     * Never writes anything.
     */
    public async checkUpdate(): Promise<boolean> {
        if (!this.marker.exists()) {
            return true
        }
        const increment = this.flavor.nextIncrement(await this.loadVersion())
        if (!increment) {
            return false
        }
        return this.deps.fetcher.probe(increment.url)
    }

    /**
     * Materializes the tree if needed, then applies every upstream point
     * release published since the last run
     */
    public async fetch(): Promise<V> {
        await ensureDirectory(this.flavor.downloadDir)

        if (this.journal?.exists()) {
            await this.recoverJournal(this.journal)
        }

        if (!this.marker.exists()) {
            if (pathExists(this.flavor.sourceDir)) {
                throw new CorruptedSourceDirError(this.flavor.sourceDir, this.flavor.markerFile)
            }
            Logger.info(`File ${this.flavor.markerFile} not found. Downloading ${this.flavor.label} archive...`)
            await this.downloadArchive()
        } else {
            await this.loadVersion()
        }

        await this.upgrade()
        return this.version
    }

    /**
     * Copies the target's configuration (if any) to the build tree
     */
    public async reconfigure(): Promise<void> {
        await ensureDirectory(this.flavor.buildDir)
        if (this.flavor.configFile === null) {
            Logger.debug("No configuration selected")
            return
        }
        const destination = join(this.flavor.buildDir, ".config")
        Logger.info(`Copying configuration ${this.flavor.configFile} to ${destination}`)
        await copyInto(this.flavor.configFile, destination)
    }

    private async applyLocalPatches(version: V): Promise<void> {
        await this.deps.patcher.applyPatchesIn(this.flavor.patchSetDir(version), this.flavor.sourceDir)
    }

    private async downloadArchive(): Promise<void> {
        const archive = join(this.flavor.downloadDir, this.flavor.archiveFile)
        await this.deps.fetcher.download(this.flavor.archiveUrl, archive)

        const dir = await this.deps.extractor.untar(archive)
        if (resolve(dir) !== resolve(this.flavor.sourceDir)) {
            throw new ArchiveError(`Archive ${archive} was expected to be decompressed as directory ${this.flavor.sourceDir}, got ${dir}`)
        }

        // From here on the tree is modified: an interruption must not leave
        // it patched without a version file
        const version = this.flavor.initialVersion
        await this.deps.interrupt.guarded(async () => {
            await this.reconfigure()
            await this.applyLocalPatches(version)
            await this.marker.write(version)
        })
        this.version = version
    }

    private async upgrade(): Promise<void> {
        const render = (v: V) => this.flavor.renderVersion(v)

        for (;;) {
            const increment = this.flavor.nextIncrement(this.version)
            if (!increment) {
                Logger.info(`${this.flavor.label} sources at version ${render(this.version)}`)
                return
            }
            if (!(await this.deps.fetcher.probe(increment.url))) {
                Logger.info(`Last version: ${render(this.version)}`)
                return
            }

            Logger.info(`Upgrading from version ${render(this.version)}`)
            const compressed = join(this.flavor.downloadDir, increment.file)
            await this.deps.fetcher.download(increment.url, compressed)
            const diff = await this.deps.extractor.unxz(compressed)

            const from = this.version
            const to = increment.next
            await this.deps.interrupt.guarded(async () => {
                await this.journal?.begin({ from: render(from), to: render(to) })
                // Upstream first, then the local patches of the new release
                await this.deps.patcher.patch(this.flavor.sourceDir, diff)
                await this.applyLocalPatches(to)
                await this.marker.write(to)
                await this.journal?.clear()
            })
            this.version = to
            Logger.success(`${this.flavor.label} upgraded to ${render(to)}`)
        }
    }

    /**
     * A journal is left behind by an upgrade that did not complete. If the
     * marker already records its target, only the journal removal was
     * missed. Otherwise nobody knows how far the patch went.
     */
    private async recoverJournal(journal: UpgradeJournal): Promise<void> {
        const entry = await journal.read()
        if (entry && this.marker.exists()) {
            const recorded = this.flavor.renderVersion(await this.marker.read())
            if (recorded === entry.to) {
                Logger.warning(`Upgrade to ${entry.to} had completed, removing stale journal ${journal.path}`)
                await journal.clear()
                return
            }
        }
        throw new InterruptedUpgradeError(
            this.flavor.sourceDir,
            journal.path,
            entry ? `${entry.from} -> ${entry.to}` : "unreadable journal"
        )
    }
}
