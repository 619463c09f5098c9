/***
 *
 *  Linux Command - kernel sources, build and packaging
 *
 */

import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { Settings } from "../../settings"
import { SourceTreeEngine } from "../../source/engine"
import { LinuxFlavor } from "../../source/linux"
import type { KernelVersion } from "../../source/version"
import { FilesystemError } from "../../utils/errors"
import { Logger } from "../../utils/log"
import { ensureDirectory } from "../../utils/path"
import type { ToolDependencies } from "../dependencies"
import { BuildDriver, type MakeInvocation } from "../make"
import { KDEB_PKGVERSION, KernelPackager, requireMaintainer } from "../package"
import { Toolchain } from "../toolchain"

export class LinuxTool {
    readonly flavor: LinuxFlavor
    readonly engine: SourceTreeEngine<KernelVersion>
    readonly toolchain: Toolchain

    private readonly driver: BuildDriver
    private readonly packager: KernelPackager

    constructor(
        private readonly settings: Settings,
        deps: ToolDependencies,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {
        this.flavor = new LinuxFlavor(settings)
        this.engine = new SourceTreeEngine(this.flavor, deps)
        this.toolchain = new Toolchain(settings, deps.fetcher, deps.extractor)
        this.driver = new BuildDriver(deps.runner)
        this.packager = new KernelPackager(deps.runner)
    }

    public get packagesDir(): string {
        return join(this.settings.buildDir, "packages")
    }

    public checkUpdate(): Promise<boolean> {
        return this.engine.checkUpdate()
    }

    public fetch(): Promise<KernelVersion> {
        return this.engine.fetch()
    }

    public reconfigure(): Promise<void> {
        return this.engine.reconfigure()
    }

    private async prepareBuild(): Promise<MakeInvocation> {
        await this.toolchain.fetch()
        await this.engine.loadVersion()
        await ensureDirectory(this.flavor.buildDir)
        return {
            sourceDir: this.flavor.sourceDir,
            buildDir: this.flavor.buildDir,
            arch: this.settings.toolchain.linux_arch,
            crossCompile: this.toolchain.crossCompile,
            jobs: this.settings.jobs,
        }
    }

    public async make(target: string): Promise<void> {
        const invocation = await this.prepareBuild()
        await this.driver.make(invocation, target)
    }

    /**
     * Builds the kernel image package and the series meta-package, and
     * returns their paths (image first)
     */
    public async buildKernelPackage(): Promise<string[]> {
        const maintainer = requireMaintainer(this.env)
        const invocation = await this.prepareBuild()
        await this.driver.make(invocation, "bindeb-pkg", [`KDEB_PKGVERSION=${KDEB_PKGVERSION}`])

        const request = {
            version: this.engine.currentVersion,
            buildDir: this.flavor.buildDir,
            packagesDir: this.packagesDir,
            target: this.settings.target,
            targetName: this.settings.targetName,
            debianArch: this.settings.toolchain.debian_arch,
            maintainer,
        }
        const image = await this.packager.collectImage(request)
        const meta = await this.packager.buildMetaPackage(request)
        return [image, meta]
    }

    /**
     * `--debpkg FILE`: packages, then lists the packages in FILE, one per line
     */
    public async debpkg(outputFile: string): Promise<string[]> {
        const packages = await this.buildKernelPackage()
        try {
            await writeFile(outputFile, packages.map(p => `${p}\n`).join(""), "utf-8")
        } catch (err) {
            throw new FilesystemError("write", outputFile, err)
        }
        Logger.info(`Package list written to ${outputFile}`)
        return packages
    }
}
