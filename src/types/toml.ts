/***
 *
 *
 *  TOML Loading
 *
 */

import { readFile } from "node:fs/promises"
import { parse as parseToml } from "@iarna/toml"
import { z } from "zod"
import { ConfigurationError, FilesystemError, describeError } from "../utils/errors"
import { fileExists } from "../utils/path"

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ")
}

/**
 * Reads `path` as TOML and validates it against `schema`
 */
export async function loadToml<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
    if (!fileExists(path)) {
        throw new ConfigurationError(`File ${path} does not exist`)
    }

    let content: string
    try {
        content = await readFile(path, "utf-8")
    } catch (err) {
        throw new FilesystemError("read", path, err)
    }

    let parsed: unknown
    try {
        parsed = parseToml(content)
    } catch (err) {
        throw new ConfigurationError(`Failed to parse ${path}: ${describeError(err)}`, { cause: err })
    }

    const result = schema.safeParse(parsed)
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration in ${path}: ${formatIssues(result.error)}`)
    }
    return result.data
}
