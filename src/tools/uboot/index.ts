/***
 *
 *  U-Boot Command - bootloader sources and build
 *
 */

import type { Settings } from "../../settings"
import { SourceTreeEngine } from "../../source/engine"
import { UbootFlavor } from "../../source/uboot"
import { ensureDirectory } from "../../utils/path"
import type { ToolDependencies } from "../dependencies"
import { BuildDriver } from "../make"
import { Toolchain } from "../toolchain"

export class UbootTool {
    readonly flavor: UbootFlavor
    readonly engine: SourceTreeEngine<string>
    readonly toolchain: Toolchain

    private readonly driver: BuildDriver

    constructor(
        private readonly settings: Settings,
        deps: ToolDependencies
    ) {
        this.flavor = new UbootFlavor(settings)
        this.engine = new SourceTreeEngine(this.flavor, deps)
        this.toolchain = new Toolchain(settings, deps.fetcher, deps.extractor)
        this.driver = new BuildDriver(deps.runner)
    }

    public fetch(): Promise<string> {
        return this.engine.fetch()
    }

    public reconfigure(): Promise<void> {
        return this.engine.reconfigure()
    }

    public async make(target: string): Promise<void> {
        await this.toolchain.fetch()
        await this.engine.loadVersion()
        await ensureDirectory(this.flavor.buildDir)
        await this.driver.make({
            sourceDir: this.flavor.sourceDir,
            buildDir: this.flavor.buildDir,
            arch: this.settings.toolchain.uboot_arch,
            crossCompile: this.toolchain.crossCompile,
            jobs: this.settings.jobs,
        }, target)
    }
}
