import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { EXIT_APPLICATION_ERROR, EXIT_LOG_SETUP_FAILED, EXIT_NO_UPDATE, EXIT_SUCCESS, main } from "../src/cli"
import type { ToolDependencies } from "../src/tools/dependencies"
import { Interrupt } from "../src/utils/interrupt"
import { Logger } from "../src/utils/log"
import { PatchApplier } from "../src/utils/patch"
import { FakeExtractor, FakeFetcher, RecordingRunner, makeTempDir, patchSimulator, removeDir } from "./helpers"

const KERNEL_ORG = "https://cdn.kernel.org/pub/linux/kernel/v5.x/"
const TOOLCHAIN_URL = "https://toolchains.example.com/gcc-arm-linux-gnueabihf.tar.xz"

const TARGET_TOML = `name = "Test Board"
toolchain = "gcc"

[linux]
version = "5.4"
config = "board.config"

[uboot]
version = "2020.04"
`

const TOOLCHAIN_TOML = `url = "${TOOLCHAIN_URL}"
linux_arch = "arm"
uboot_arch = "arm"
debian_arch = "armhf"
cross_compile = "bin/arm-linux-gnueabihf-"
`

function write(path: string, content: string): void {
    mkdirSync(join(path, ".."), { recursive: true })
    writeFileSync(path, content)
}

describe("tcbkit command line", () => {
    let root: string
    let fetcher: FakeFetcher
    let runner: RecordingRunner

    function run(args: string[], options: { logLevel?: string; target?: string | null } = {}): Promise<number> {
        const target = options.target === undefined ? "board" : options.target
        return main([
            "node", "tcbkit",
            "-L", "library",
            "-D", "download",
            "-B", "build",
            ...(target === null ? [] : ["-t", target]),
            "--log-level", options.logLevel ?? "error",
            ...args,
        ], {
            cwd: root,
            env: {},
            interrupt: new Interrupt((code) => {
                throw new Error(`terminated with code ${code}`)
            }),
            dependencies: (interrupt): ToolDependencies => ({
                fetcher,
                extractor: new FakeExtractor(),
                patcher: new PatchApplier(runner),
                interrupt,
                runner,
            }),
        })
    }

    beforeEach(() => {
        root = makeTempDir()
        write(join(root, "library", "targets", "board.toml"), TARGET_TOML)
        write(join(root, "library", "toolchains", "gcc.toml"), TOOLCHAIN_TOML)
        write(join(root, "library", "configs", "linux", "5.4", "board.config"), "CONFIG_TEST=y\n")
        fetcher = new FakeFetcher()
            .publish(`${KERNEL_ORG}linux-5.4.tar.xz`, "linux 5.4")
            .publish(`${KERNEL_ORG}patch-5.4.1.xz`, "upstream 5.4.1")
            .publish("https://ftp.denx.de/pub/u-boot/u-boot-2020.04.tar.bz2", "u-boot 2020.04")
            .publish(TOOLCHAIN_URL, "toolchain")
        runner = new RecordingRunner(patchSimulator)
        jest.spyOn(console, "error").mockImplementation(() => undefined)
    })

    afterEach(() => {
        jest.restoreAllMocks()
        Logger.setLevel("error")
        removeDir(root)
    })

    test("linux actions run as fetch, reconfigure, make whatever their order on the line", async () => {
        expect(await run(["linux", "--make", "zImage", "--reconfigure", "--fetch"])).toBe(EXIT_SUCCESS)

        expect(readFileSync(join(root, "download", "linux-5.4.version"), "utf-8")).toBe("5.4.1")
        expect(readFileSync(join(root, "build", "linux-5.4-board", ".config"), "utf-8")).toBe("CONFIG_TEST=y\n")
        expect(runner.calls.map(call => call.command)).toEqual(["patch", "make"])
        expect(runner.calls[1].args.at(-1)).toBe("zImage")
    })

    test("--check-update exits with 100 and skips the other actions when up to date", async () => {
        expect(await run(["linux", "--fetch"])).toBe(EXIT_SUCCESS)
        fetcher.downloads.length = 0

        expect(await run(["linux", "--check-update", "--fetch"])).toBe(EXIT_NO_UPDATE)
        expect(fetcher.downloads).toEqual([])
        expect(fetcher.probes.at(-1)).toBe(`${KERNEL_ORG}incr/patch-5.4.1-2.xz`)
    })

    test("--check-update goes on with the other actions when an update exists", async () => {
        expect(await run(["linux", "--check-update", "--fetch"])).toBe(EXIT_SUCCESS)
        expect(readFileSync(join(root, "download", "linux-5.4.version"), "utf-8")).toBe("5.4.1")
    })

    test("a corrupted source directory exits with 2 before downloading", async () => {
        mkdirSync(join(root, "download", "linux-5.4"), { recursive: true })

        expect(await run(["linux", "--fetch"])).toBe(EXIT_APPLICATION_ERROR)
        expect(fetcher.downloads).toEqual([])
        expect(existsSync(join(root, "download", "linux-5.4.version"))).toBe(false)
    })

    test("an invalid log level exits with 3", async () => {
        expect(await run(["linux", "--fetch"], { logLevel: "loud" })).toBe(EXIT_LOG_SETUP_FAILED)
        expect(console.error).toHaveBeenCalledWith(
            "ERROR: Invalid log level 'loud'. Must be one of: error, warn, info, debug, trace"
        )
        expect(fetcher.downloads).toEqual([])
    })

    test("a missing target exits with 2", async () => {
        expect(await run(["linux", "--fetch"], { target: null })).toBe(EXIT_APPLICATION_ERROR)
        expect(fetcher.downloads).toEqual([])
    })

    test("packaging without MAINTAINER exits with 2", async () => {
        expect(await run(["linux", "--fetch"])).toBe(EXIT_SUCCESS)
        runner.calls.length = 0

        expect(await run(["linux", "--debpkg", join(root, "packages.txt")])).toBe(EXIT_APPLICATION_ERROR)
        expect(runner.calls).toEqual([])
        expect(existsSync(join(root, "packages.txt"))).toBe(false)
    })

    test("an unknown option exits with 2", async () => {
        jest.spyOn(process.stderr, "write").mockImplementation(() => true)
        expect(await run(["linux", "--frobnicate"])).toBe(EXIT_APPLICATION_ERROR)
    })

    test("uboot --fetch materializes the bootloader sources", async () => {
        expect(await run(["uboot", "--fetch"])).toBe(EXIT_SUCCESS)
        expect(readFileSync(join(root, "download", "u-boot-2020.04.version"), "utf-8")).toBe("2020.04")
    })
})
