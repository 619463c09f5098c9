/***
 *
 *
 *  Toolchain Descriptor (toolchains/<name>.toml) Validation Schema
 *
 */

import { join } from "node:path"
import { z } from "zod"
import { loadToml } from "./toml"

export const ToolchainTomlSchema = z.object({
    url: z.string().url(),
    linux_arch: z.string().min(1),
    uboot_arch: z.string().min(1),
    debian_arch: z.string().min(1),
    // Relative to the unpacked toolchain, e.g. "bin/arm-linux-gnueabihf-"
    cross_compile: z.string().min(1),
}).strict()

export type ToolchainToml = z.infer<typeof ToolchainTomlSchema>

export async function loadToolchainToml(library: string, toolchain: string): Promise<ToolchainToml> {
    return loadToml(join(library, "toolchains", `${toolchain}.toml`), ToolchainTomlSchema)
}
