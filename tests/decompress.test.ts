import { mkdirSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { ShellExtractor } from "../src/utils/decompress"
import { ArchiveError } from "../src/utils/errors"
import { stripArchiveExtension, urlBasename } from "../src/utils/path"
import { ProcessRunner } from "../src/utils/run"
import { Logger, Spinner } from "../src/utils/log"
import { RecordingRunner, makeTempDir, removeDir } from "./helpers"

describe("archive names", () => {
    test.each([
        ["/dl/linux-5.4.tar.xz", "/dl/linux-5.4"],
        ["/dl/u-boot-2020.04.tar.bz2", "/dl/u-boot-2020.04"],
        ["/dl/gcc-10.2.tgz", "/dl/gcc-10.2"],
        ["/dl/sources.tar", "/dl/sources"],
        ["/dl/patch-5.4.1.xz", "/dl/patch-5.4.1.xz"],
    ])("%s unpacks as %s", (archive, dir) => {
        expect(stripArchiveExtension(archive)).toBe(dir)
    })

    test("file name of a URL", () => {
        expect(urlBasename("https://cdn.kernel.org/pub/linux/kernel/v5.x/incr/patch-5.4.1-2.xz")).toBe("patch-5.4.1-2.xz")
    })
})

describe("ShellExtractor", () => {
    let dir: string

    beforeEach(() => {
        dir = makeTempDir()
    })

    afterEach(() => {
        removeDir(dir)
    })

    test("untars next to the archive", async () => {
        const archive = join(dir, "linux-5.4.tar.xz")
        writeFileSync(archive, "")
        const runner = new RecordingRunner(() => {
            mkdirSync(join(dir, "linux-5.4"))
        })

        expect(await new ShellExtractor(runner).untar(archive)).toBe(join(dir, "linux-5.4"))
        expect(runner.calls.map(call => [call.command, ...call.args])).toEqual([["tar", "-C", dir, "-xf", archive]])
    })

    test("untar leaves the terminal to tar", async () => {
        const archive = join(dir, "linux-5.4.tar.xz")
        writeFileSync(archive, "")
        const start = jest.spyOn(Spinner.prototype, "start")
        Logger.setLevel("info")
        const log = jest.spyOn(console, "log").mockImplementation(() => undefined)
        try {
            await new ShellExtractor(new RecordingRunner(() => {
                mkdirSync(join(dir, "linux-5.4"))
            })).untar(archive)
            expect(start).not.toHaveBeenCalled()
        } finally {
            Logger.setLevel("error")
            start.mockRestore()
            log.mockRestore()
        }
    })

    test("an archive that does not unpack to its name is an error", async () => {
        const archive = join(dir, "linux-5.4.tar.xz")
        writeFileSync(archive, "")
        await expect(new ShellExtractor(new RecordingRunner()).untar(archive)).rejects.toBeInstanceOf(ArchiveError)
    })

    test("a missing archive is an error", async () => {
        const runner = new RecordingRunner()
        await expect(new ShellExtractor(runner).untar(join(dir, "none.tar.xz")))
            .rejects.toThrow(`File ${join(dir, "none.tar.xz")} does not exist`)
        expect(runner.calls).toEqual([])
    })

    test("unxz keeps the compressed file", async () => {
        const file = join(dir, "patch-5.4.1.xz")
        const runner = new RecordingRunner(() => {
            writeFileSync(join(dir, "patch-5.4.1"), "diff")
        })

        expect(await new ShellExtractor(runner).unxz(file)).toBe(join(dir, "patch-5.4.1"))
        expect(runner.calls[0].args).toEqual(["--decompress", "--keep", "--force", file])
    })

    test("unxz refuses other files", async () => {
        await expect(new ShellExtractor(new RecordingRunner()).unxz(join(dir, "patch.gz")))
            .rejects.toBeInstanceOf(ArchiveError)
    })

    test("a failing xz is an error", async () => {
        const runner = new RecordingRunner(() => 1)
        await expect(new ShellExtractor(runner).unxz(join(dir, "patch-5.4.1.xz")))
            .rejects.toThrow(`Failed to decode Xz data at path ${join(dir, "patch-5.4.1.xz")}`)
    })
})

describe("ProcessRunner", () => {
    const runner = new ProcessRunner()

    test("captures output and exit code", async () => {
        const result = await runner.run("sh", ["-c", "echo out; echo err >&2; exit 3"])
        expect(result).toEqual({ exitCode: 3, stdout: "out\n", stderr: "err\n" })
    })

    test("runs in the given directory", async () => {
        const dir = makeTempDir()
        try {
            const result = await runner.run("pwd", [], { cwd: dir, isolated: true })
            expect(result.exitCode).toBe(0)
            expect(result.stdout.trim().endsWith(dir.split("/").at(-1) ?? "")).toBe(true)
        } finally {
            removeDir(dir)
        }
    })

    test("an interactive child writes to the terminal, nothing is captured", async () => {
        const result = await runner.run("sh", ["-c", "exit 4"], { interactive: true })
        expect(result).toEqual({ exitCode: 4, stdout: "", stderr: "" })
    })

    test("a missing program is a subprocess error", async () => {
        await expect(runner.run("tcbkit-no-such-program", [])).rejects.toThrow(
            /Failed to run process 'tcbkit-no-such-program'/
        )
    })
})
