/***
 *
 *
 *  Source Component Flavors
 *
 *  The lifecycle engine is the same for every source tree it manages. What
 *  differs between Linux and U-Boot (where the archive lives, how versions
 *  are written, whether upstream publishes incremental patches) is captured
 *  here.
 *
 */

export type ComponentName = "linux" | "uboot"

export interface Increment<V> {
    url: string
    // Name of the compressed patch, also its name in the download directory
    file: string
    next: V
}

export interface ComponentFlavor<V> {
    readonly name: ComponentName
    // Human-readable, for log lines
    readonly label: string

    readonly downloadDir: string
    readonly sourceDir: string
    readonly markerFile: string
    // Only flavors with incremental upgrades keep a journal
    readonly journalFile: string | null

    readonly archiveUrl: string
    readonly archiveFile: string

    readonly buildDir: string
    // Absolute path of the .config to seed the build tree with
    readonly configFile: string | null

    readonly initialVersion: V

    parseVersion(text: string): V
    renderVersion(version: V): string
    /**
     * Checks a version read back from disk belongs to this tree
     */
    validateVersion(version: V): void

    nextIncrement(version: V): Increment<V> | null

    patchSetDir(version: V): string
}
