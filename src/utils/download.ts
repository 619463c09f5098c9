/***
 *
 *
 *  HTTP Fetcher
 *
 */

import { open, type FileHandle } from "node:fs/promises"
import { basename } from "node:path"
import { Logger, Spinner } from "./log"
import { DownloadFailedError, FilesystemError, NetworkError, describeError } from "./errors"

// 226 is what FTP-style mirrors answer once a transfer is complete
const SUCCESS_CODES = new Set([200, 226])

export interface Fetcher {
    /**
     * Whether the file behind `url` is published. Anything but a clear
     * answer counts as "not there", so a flaky mirror never fakes an update.
     */
    probe(url: string): Promise<boolean>
    download(url: string, path: string): Promise<void>
}

function checkUrl(url: string): URL {
    let parsed: URL
    try {
        parsed = new URL(url)
    } catch (err) {
        throw new NetworkError(`Invalid URL '${url}'`, { cause: err })
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        throw new NetworkError(`Unsupported URL '${url}': only http and https are supported`)
    }
    return parsed
}

export function formatBytes(bytes: number): string {
    const units = ["B", "KiB", "MiB", "GiB"]
    let value = bytes
    let unit = 0
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024
        unit++
    }
    return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`
}

export function formatEta(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds < 0) return "--:--"
    const total = Math.round(seconds)
    const h = Math.floor(total / 3600)
    const m = Math.floor((total % 3600) / 60)
    const s = total % 60
    const mmss = `${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`
    return h > 0 ? `${h}:${mmss}` : mmss
}

/**
 * `received / total (ETA)`, or just the byte count when the server did not
 * announce a length
 */
export function formatProgress(received: number, total: number | null, elapsedMs: number): string {
    if (total === null || total <= 0) {
        return formatBytes(received)
    }
    const rate = elapsedMs > 0 ? received / (elapsedMs / 1000) : 0
    const eta = rate > 0 ? (total - received) / rate : Number.NaN
    return `${formatBytes(received)} / ${formatBytes(total)} (ETA ${formatEta(eta)})`
}

export class HttpFetcher implements Fetcher {

    public async probe(url: string): Promise<boolean> {
        checkUrl(url)
        Logger.debug(`Checking if file is available at ${url}`)
        let status: number
        try {
            const response = await fetch(url, { method: "HEAD", redirect: "follow" })
            status = response.status
        } catch (err) {
            Logger.debug(`Request to ${url} failed: ${describeError(err)}`)
            return false
        }
        Logger.trace(`HEAD ${url} -> ${status}`)
        return SUCCESS_CODES.has(status)
    }

    public async download(url: string, path: string): Promise<void> {
        checkUrl(url)

        let handle: FileHandle
        try {
            handle = await open(path, "w")
        } catch (err) {
            throw new FilesystemError("create", path, err)
        }

        const name = basename(path)
        const spinner = new Spinner(`Downloading ${name}...`)
        spinner.start()

        try {
            let response: Response
            try {
                response = await fetch(url, { redirect: "follow" })
            } catch (err) {
                throw new NetworkError(`Failed to download file from URL ${url}: ${describeError(err)}`, { cause: err })
            }

            if (!SUCCESS_CODES.has(response.status) || !response.body) {
                // Release the connection instead of leaving the body unread
                await response.body?.cancel()
                throw new DownloadFailedError(url, response.status)
            }

            const length = Number.parseInt(response.headers.get("content-length") ?? "", 10)
            const total = Number.isNaN(length) ? null : length
            const started = Date.now()
            let received = 0

            const reader = response.body.getReader()
            const nextChunk = async (): Promise<Uint8Array | null> => {
                try {
                    const chunk = await reader.read()
                    return chunk.done ? null : chunk.value
                } catch (err) {
                    throw new NetworkError(`Failed to download file from URL ${url}: ${describeError(err)}`, { cause: err })
                }
            }

            for (let chunk = await nextChunk(); chunk !== null; chunk = await nextChunk()) {
                try {
                    await handle.write(chunk)
                } catch (err) {
                    throw new FilesystemError("write", path, err)
                }
                received += chunk.byteLength
                spinner.updateMessage(`Downloading ${name} ${formatProgress(received, total, Date.now() - started)}`)
            }

            spinner.stopWithSuccess(`Downloaded ${name} (${formatBytes(received)})`)
        } catch (err) {
            spinner.stopWithError(`Download of ${name} failed`)
            throw err
        } finally {
            await handle.close()
        }
    }
}
