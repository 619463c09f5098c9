import { appendFileSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import type { CommandRunner, RunOptions, RunResult } from "../src/utils/run"
import type { Fetcher } from "../src/utils/download"
import type { Extractor } from "../src/utils/decompress"
import { stripArchiveExtension } from "../src/utils/path"

export function makeTempDir(prefix = "tcbkit-test-"): string {
    return mkdtempSync(join(tmpdir(), prefix))
}

export function removeDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true })
}

export interface RecordedCall {
    command: string
    args: string[]
    options: RunOptions
}

type Handler = (call: RecordedCall) => number | void

/**
 * Records every command instead of running it. The handler may simulate the
 * command's effect and return its exit code (0 by default).
 */
export class RecordingRunner implements CommandRunner {
    readonly calls: RecordedCall[] = []

    constructor(private readonly handler: Handler = () => 0) {}

    async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
        const call = { command, args, options }
        this.calls.push(call)
        const exitCode = this.handler(call) ?? 0
        return { exitCode, stdout: "", stderr: exitCode === 0 ? "" : `${command} failed` }
    }
}

/**
 * Stands in for `patch`: appends the first line of the diff to APPLIED in
 * the working directory, and fails for diffs whose content starts with FAIL
 */
export function patchSimulator(call: RecordedCall): number | void {
    if (call.command !== "patch") return 0
    const diff = call.args[call.args.indexOf("-i") + 1]
    const content = readFileSync(diff, "utf-8")
    if (content.startsWith("FAIL")) return 1
    appendFileSync(join(call.options.cwd ?? ".", "APPLIED"), `${content.split("\n")[0]}\n`)
}

/**
 * Serves a fixed set of files by URL
 */
export class FakeFetcher implements Fetcher {
    readonly probes: string[] = []
    readonly downloads: string[] = []

    constructor(readonly files: Map<string, string> = new Map()) {}

    publish(url: string, content: string): this {
        this.files.set(url, content)
        return this
    }

    async probe(url: string): Promise<boolean> {
        this.probes.push(url)
        return this.files.has(url)
    }

    async download(url: string, path: string): Promise<void> {
        this.downloads.push(url)
        const content = this.files.get(url)
        if (content === undefined) {
            throw new Error(`404 ${url}`)
        }
        writeFileSync(path, content)
    }
}

/**
 * "Unpacks" an archive into a directory holding a BASE file with the
 * archive's content, and "decompresses" by copying
 */
export class FakeExtractor implements Extractor {
    readonly untarred: string[] = []

    constructor(private readonly unpackAs?: (archive: string) => string) {}

    async untar(archive: string): Promise<string> {
        this.untarred.push(archive)
        const dir = this.unpackAs ? this.unpackAs(archive) : stripArchiveExtension(archive)
        mkdirSync(dir, { recursive: true })
        writeFileSync(join(dir, "BASE"), readFileSync(archive))
        return dir
    }

    async unxz(file: string): Promise<string> {
        const out = file.slice(0, -".xz".length)
        writeFileSync(out, readFileSync(file))
        return out
    }
}
