/***
 *
 *
 *  Command Line Interface
 *
 */

import { Command, CommanderError } from "commander"
import { loadSettings, type GlobalOptions, type Settings } from "./settings"
import { LinuxTool } from "./tools/linux"
import { UbootTool } from "./tools/uboot"
import { defaultDependencies, type ToolDependencies } from "./tools/dependencies"
import { Interrupt } from "./utils/interrupt"
import { Logger, parseLogLevel } from "./utils/log"
import { LogSetupError, describeError } from "./utils/errors"
import { TCBKIT_VERSION } from "./version"

export const EXIT_SUCCESS = 0
export const EXIT_APPLICATION_ERROR = 2
export const EXIT_LOG_SETUP_FAILED = 3
export const EXIT_NO_UPDATE = 100

type ProgramOptions = GlobalOptions & {
    logLevel: string
    verbose?: boolean
}

interface LinuxOptions {
    checkUpdate?: boolean
    fetch?: boolean
    reconfigure?: boolean
    make?: string
    debpkg?: string
}

interface UbootOptions {
    fetch?: boolean
    reconfigure?: boolean
    make?: string
}

export interface CliContext {
    cwd?: string
    env?: NodeJS.ProcessEnv
    interrupt?: Interrupt
    dependencies?: (interrupt: Interrupt) => ToolDependencies
}

function buildProgram(context: Required<CliContext>, setExitCode: (code: number) => void): Command {
    const load = async (command: Command): Promise<{ settings: Settings; deps: ToolDependencies }> => {
        const settings = await loadSettings(command.optsWithGlobals<ProgramOptions>(), context.cwd)
        return { settings, deps: context.dependencies(context.interrupt) }
    }

    const program = new Command()

    program
        .name("tcbkit")
        .description("Build the Trusted Computing Base (TCB) of an embedded target")
        .version(TCBKIT_VERSION)
        .option("-L, --library <dir>", "Set the path to the TCB library (default: current directory)")
        .option("-B, --build-dir <dir>", "Set the path to the build directory (default: ./build)")
        .option("-D, --download-dir <dir>", "Set the path to the download directory (default: ./download)")
        .option("-t, --target <name>", "Name of the target to operate on")
        .option("-j, --jobs <n>", "Set the number of parallel jobs to be used (default: CPUs + 2)")
        .option("--log-level <level>", "Logging threshold: error, warn, info, debug or trace", "info")
        .option("--verbose", "Enable verbose output (same as --log-level debug)")
        .exitOverride()
        .hook("preAction", (thisCommand) => {
            const opts = thisCommand.opts<ProgramOptions>()
            Logger.setLevel(opts.verbose ? "debug" : parseLogLevel(opts.logLevel))
        })

    program.command("linux")
        .description("Operations on the Linux kernel")
        .option("--check-update", "Check whether a new update is available on kernel.org. If no update is available, exit with status 100")
        .option("--fetch", "Retrieve the latest version of the Linux kernel")
        .option("--reconfigure", "Copy the target's configuration to the build directory")
        .option("--make <target>", "Run a make target in the Linux tree")
        .option("--debpkg <file>", "Build the kernel Debian packages and list them in <file>")
        .action(async (options: LinuxOptions, command: Command) => {
            const { settings, deps } = await load(command)
            const linux = new LinuxTool(settings, deps, context.env)

            if (options.checkUpdate) {
                if (await linux.checkUpdate()) {
                    Logger.info("A new version of the Linux kernel is available")
                } else {
                    Logger.info("The Linux kernel is up to date")
                    setExitCode(EXIT_NO_UPDATE)
                    return
                }
            }
            if (options.fetch) {
                await linux.fetch()
            }
            if (options.reconfigure) {
                await linux.reconfigure()
            }
            if (options.make !== undefined) {
                await linux.make(options.make)
            }
            if (options.debpkg !== undefined) {
                await linux.debpkg(options.debpkg)
            }
        })

    program.command("uboot")
        .description("Operations on the U-Boot bootloader")
        .option("--fetch", "Retrieve the U-Boot sources")
        .option("--reconfigure", "Copy the target's configuration to the build directory")
        .option("--make <target>", "Run a make target in the U-Boot tree")
        .action(async (options: UbootOptions, command: Command) => {
            const { settings, deps } = await load(command)
            const uboot = new UbootTool(settings, deps)

            if (options.fetch) {
                await uboot.fetch()
            }
            if (options.reconfigure) {
                await uboot.reconfigure()
            }
            if (options.make !== undefined) {
                await uboot.make(options.make)
            }
        })

    return program
}

/**
 * Runs the program on `argv` (as found in process.argv) and resolves to the
 * exit code
 */
export async function main(argv: string[], context: CliContext = {}): Promise<number> {
    let exitCode = EXIT_SUCCESS
    const program = buildProgram({
        cwd: context.cwd ?? process.cwd(),
        env: context.env ?? process.env,
        interrupt: context.interrupt ?? new Interrupt(),
        dependencies: context.dependencies ?? defaultDependencies,
    }, (code) => {
        exitCode = code
    })

    try {
        await program.parseAsync(argv)
    } catch (err) {
        if (err instanceof CommanderError) {
            // Help and version output end up here too
            return err.exitCode === 0 ? EXIT_SUCCESS : EXIT_APPLICATION_ERROR
        }
        if (err instanceof LogSetupError) {
            console.error(`ERROR: ${describeError(err)}`)
            return EXIT_LOG_SETUP_FAILED
        }
        Logger.error(describeError(err))
        return EXIT_APPLICATION_ERROR
    }
    return exitCode
}
