/***
 *
 *
 *  Error Taxonomy
 *
 *  Every failure of an invocation is one of these kinds. Nothing is retried:
 *  errors bubble up to the entry point, which prints a single line.
 *
 */

export type ErrorKind =
    | "configuration"
    | "filesystem"
    | "archive"
    | "network"
    | "patch"
    | "consistency"
    | "subprocess"
    | "packaging"
    | "logging"

export abstract class TcbError extends Error {
    abstract readonly kind: ErrorKind

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

export class ConfigurationError extends TcbError {
    readonly kind = "configuration"
}

export class FilesystemError extends TcbError {
    readonly kind = "filesystem"

    constructor(
        readonly operation: string,
        readonly path: string,
        cause?: unknown
    ) {
        super(`Failed to ${operation} ${path}${cause instanceof Error ? `: ${cause.message}` : ""}`, { cause })
    }
}

export class ArchiveError extends TcbError {
    readonly kind = "archive"
}

export class NetworkError extends TcbError {
    readonly kind = "network"
}

export class DownloadFailedError extends NetworkError {
    constructor(
        readonly url: string,
        readonly code: number
    ) {
        super(`Failed to download file from URL ${url}: HTTP code: ${code}`)
    }
}

export class PatchError extends TcbError {
    readonly kind = "patch"
}

export class ConsistencyError extends TcbError {
    readonly kind = "consistency"
}

/**
 * A source tree in an unknown state, which is refused until the user removes it
 */
export abstract class CorruptTreeError extends ConsistencyError {
    constructor(readonly dir: string, message: string) {
        super(message)
    }
}

export class CorruptedSourceDirError extends CorruptTreeError {
    constructor(
        dir: string,
        readonly versionFile: string
    ) {
        super(
            dir,
            `Corrupted download directory: the version file ${versionFile} does not exist, ` +
            `but the source directory ${dir} exists. Please remove this directory.`
        )
    }
}

export class BadVersionFormatError extends ConsistencyError {
    constructor(
        readonly input: string,
        expected = "'X.Y' or 'X.Y.Z' with decimal components"
    ) {
        super(`Invalid version '${input}': expected ${expected}`)
    }
}

export class InterruptedUpgradeError extends CorruptTreeError {
    constructor(
        dir: string,
        readonly journalFile: string,
        readonly detail: string
    ) {
        super(
            dir,
            `Source directory ${dir} was left in the middle of an upgrade (${detail}). ` +
            `Remove ${dir} and ${journalFile}, then fetch again.`
        )
    }
}

export class SubprocessError extends TcbError {
    readonly kind = "subprocess"
}

export class PackagingError extends TcbError {
    readonly kind = "packaging"
}

export class LogSetupError extends TcbError {
    readonly kind = "logging"
}

/**
 * Renders anything thrown as a one-line message
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
