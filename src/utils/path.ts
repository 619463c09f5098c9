/***
 *
 *  Path Utility Functions
 *
 */

import { statSync, existsSync } from "node:fs"
import { mkdir, copyFile, rename, unlink } from "node:fs/promises"
import { basename, dirname, join } from "node:path"
import { FilesystemError } from "./errors"

// Checks if a regular file exists
export function fileExists(path: string): boolean {
    try {
        return statSync(path).isFile()
    } catch {
        return false
    }
}

// Checks if a directory exists
export function directoryExists(path: string): boolean {
    try {
        return statSync(path).isDirectory()
    } catch {
        return false
    }
}

// Checks if a path exists (file or directory)
export function pathExists(path: string): boolean {
    return existsSync(path)
}

export async function ensureDirectory(path: string): Promise<void> {
    try {
        await mkdir(path, { recursive: true })
    } catch (err) {
        throw new FilesystemError("create directory", path, err)
    }
}

export async function copyInto(from: string, to: string): Promise<void> {
    try {
        await copyFile(from, to)
    } catch (err) {
        throw new FilesystemError(`copy ${from} to`, to, err)
    }
}

export async function moveFile(from: string, to: string): Promise<void> {
    try {
        await rename(from, to)
    } catch (err) {
        throw new FilesystemError(`move ${from} to`, to, err)
    }
}

export async function removeFile(path: string): Promise<void> {
    try {
        await unlink(path)
    } catch (err) {
        throw new FilesystemError("remove", path, err)
    }
}

/**
 * Strips the archive extensions from a path: `dl/linux-5.4.tar.xz` gives
 * `dl/linux-5.4`. Only `.tar.*` and `.t?z` style names are understood.
 */
export function stripArchiveExtension(path: string): string {
    const name = basename(path)
    const match = /^(.+?)(\.tar(\.[A-Za-z0-9]+)?|\.t[gbx]z2?)$/.exec(name)
    if (!match) return path
    return join(dirname(path), match[1])
}

/**
 * Last path component of a URL
 */
export function urlBasename(url: string): string {
    const segments = new URL(url).pathname.split("/").filter(s => s.length > 0)
    const last = segments.at(-1)
    if (last === undefined) {
        throw new FilesystemError("derive a file name from", url)
    }
    return decodeURIComponent(last)
}
