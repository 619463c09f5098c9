/***
 *
 *
 *  Target Descriptor (targets/<name>.toml) Validation Schema
 *
 */

import { join } from "node:path"
import { z } from "zod"
import { loadToml } from "./toml"

// A component to build: its version, and optionally the .config to start from
const ComponentSchema = z.object({
    version: z.string().min(1),
    config: z.string().min(1).optional(),
}).strict()

export const TargetTomlSchema = z.object({
    toolchain: z.string().min(1),
    name: z.string().min(1),
    linux: ComponentSchema,
    uboot: ComponentSchema.optional(),
}).strict()

export type ComponentToml = z.infer<typeof ComponentSchema>
export type TargetToml = z.infer<typeof TargetTomlSchema>

export function targetTomlPath(library: string, target: string): string {
    return join(library, "targets", `${target}.toml`)
}

export async function loadTargetToml(library: string, target: string): Promise<TargetToml> {
    return loadToml(targetTomlPath(library, target), TargetTomlSchema)
}
