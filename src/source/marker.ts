/***
 *
 *
 *  Version Marker & Upgrade Journal
 *
 *  The marker is the single file recording which version a source tree was
 *  fully materialized at. It is always the last thing written when the
 *  tree changes. The journal records an upstream upgrade in flight, so a
 *  tree that was patched but never got its marker bumped is recognized.
 *
 */

import { readFile, writeFile } from "node:fs/promises"
import { fileExists, removeFile } from "../utils/path"
import { ConsistencyError, FilesystemError } from "../utils/errors"
import { Logger } from "../utils/log"

export interface VersionCodec<V> {
    parseVersion(text: string): V
    renderVersion(version: V): string
}

async function readText(path: string): Promise<string> {
    try {
        return await readFile(path, "utf-8")
    } catch (err) {
        throw new FilesystemError("read", path, err)
    }
}

async function writeText(path: string, content: string): Promise<void> {
    try {
        await writeFile(path, content, "utf-8")
    } catch (err) {
        throw new FilesystemError("write", path, err)
    }
}

export class VersionMarker<V> {

    constructor(
        readonly path: string,
        private readonly codec: VersionCodec<V>,
        private readonly label: string
    ) {}

    public exists(): boolean {
        return fileExists(this.path)
    }

    public async read(): Promise<V> {
        if (!this.exists()) {
            throw new ConsistencyError(`Cannot operate on ${this.label} because no source has been downloaded (run --fetch?)`)
        }
        const text = await readText(this.path)
        return this.codec.parseVersion(text.trimEnd())
    }

    public async write(version: V): Promise<void> {
        const text = this.codec.renderVersion(version)
        Logger.trace(`Writing version ${text} to ${this.path}`)
        await writeText(this.path, text)
    }
}

export interface JournalEntry {
    from: string
    to: string
}

const JOURNAL_LINE = /^begin-upgrade (\S+) (\S+)$/

export class UpgradeJournal {

    constructor(readonly path: string) {}

    public exists(): boolean {
        return fileExists(this.path)
    }

    /**
     * Returns null when the journal cannot be understood
     */
    public async read(): Promise<JournalEntry | null> {
        const match = JOURNAL_LINE.exec((await readText(this.path)).trim())
        if (!match) return null
        return { from: match[1], to: match[2] }
    }

    public async begin(entry: JournalEntry): Promise<void> {
        await writeText(this.path, `begin-upgrade ${entry.from} ${entry.to}\n`)
    }

    public async clear(): Promise<void> {
        await removeFile(this.path)
    }
}
