/***
 *
 *  Kernel Packaging
 *
 *  The kernel build produces linux-image-<version>_1_<arch>.deb. Next to it
 *  goes a meta-package, linux-image-<M>.<N>-<target>, that always depends on
 *  the latest image of the series so targets upgrade with apt.
 *
 */

import { writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { DEBIAN_CONTROL } from "../../files/debian-control"
import { FilesystemError, PackagingError } from "../../utils/errors"
import { Logger } from "../../utils/log"
import { ensureDirectory, fileExists, moveFile } from "../../utils/path"
import { Runner, reportFailure, type CommandRunner } from "../../utils/run"
import type { KernelVersion } from "../../source/version"

// Debian revision of the image package, forced through KDEB_PKGVERSION
export const KDEB_PKGVERSION = "1"

export function requireMaintainer(env: NodeJS.ProcessEnv = process.env): string {
    const maintainer = env.MAINTAINER?.trim()
    if (!maintainer) {
        throw new PackagingError("Failed to retrieve mandatory environment variable 'MAINTAINER'")
    }
    return maintainer
}

export function imagePackageName(version: KernelVersion, debianArch: string): string {
    return `linux-image-${version.toString()}_${KDEB_PKGVERSION}_${debianArch}.deb`
}

export function metaPackageName(version: KernelVersion, target: string): string {
    return `linux-image-${version.series}-${target}`
}

export interface PackageRequest {
    version: KernelVersion
    // The kernel's O= directory; make bindeb-pkg writes the image one level up
    buildDir: string
    packagesDir: string
    target: string
    targetName: string
    debianArch: string
    maintainer: string
}

export class KernelPackager {

    constructor(private readonly runner: CommandRunner = Runner) {}

    /**
     * Moves the image produced by bindeb-pkg to the packages directory
     */
    public async collectImage(request: PackageRequest): Promise<string> {
        const name = imagePackageName(request.version, request.debianArch)
        const produced = join(dirname(request.buildDir), name)
        const destination = join(request.packagesDir, name)

        if (!fileExists(produced)) {
            if (fileExists(destination)) {
                return destination
            }
            throw new PackagingError(`We were expected to have created a Debian package at path ${produced}`)
        }
        await ensureDirectory(request.packagesDir)
        await moveFile(produced, destination)
        return destination
    }

    /**
     * Writes DEBIAN/control and runs dpkg-deb to build the meta-package
     */
    public async buildMetaPackage(request: PackageRequest): Promise<string> {
        const pkg = metaPackageName(request.version, request.target)
        const debianDir = join(request.packagesDir, pkg, "DEBIAN")
        const controlFile = join(debianDir, "control")

        await ensureDirectory(debianDir)
        const control = DEBIAN_CONTROL({
            package: pkg,
            debianArch: request.debianArch,
            maintainer: request.maintainer,
            series: request.version.series,
            targetName: request.targetName,
            version: request.version.toString(),
        })
        try {
            await writeFile(controlFile, control, "utf-8")
        } catch (err) {
            throw new FilesystemError("write", controlFile, err)
        }
        Logger.debug(`Wrote ${controlFile}`)

        const result = await this.runner.run("dpkg-deb", ["--build", pkg], { cwd: request.packagesDir })
        if (result.exitCode !== 0) {
            reportFailure(result)
            throw new PackagingError(`Failed to create Debian package '${pkg}'`)
        }

        const deb = join(request.packagesDir, `${pkg}.deb`)
        if (!fileExists(deb)) {
            throw new PackagingError(`We were expected to have created a Debian package at path ${deb}`)
        }
        Logger.success(`Built ${deb}`)
        return deb
    }
}
