/***
 *
 *
 *  Interrupt Guard
 *
 *  Ctrl-C must not leave a source tree half patched. Code that mutates a
 *  tree holds a Guard: a signal that arrives meanwhile is latched, and the
 *  process terminates when the guard is released instead of mid-way.
 *
 */

import { Logger } from "./log"

// Platform equivalent of exit(-1)
export const INTERRUPTED_EXIT_CODE = 255

export type Terminate = (code: number) => never

export class Guard {
    private released = false

    constructor(private readonly owner: Interrupt) {}

    public release(): void {
        if (this.released) return
        this.released = true
        this.owner.unlock()
    }
}

export class Interrupt {
    private pending = false
    private locked = false
    private installed = false

    constructor(private readonly terminate: Terminate = (code) => process.exit(code)) {}

    public get isLocked(): boolean {
        return this.locked
    }

    public get isPending(): boolean {
        return this.pending
    }

    /**
     * Registers the signal handlers. Safe to call more than once.
     */
    public install(signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]): void {
        if (this.installed) return
        this.installed = true
        for (const signal of signals) {
            process.on(signal, () => this.handleSignal(signal))
        }
    }

    public handleSignal(signal: NodeJS.Signals): void {
        Logger.error(`Interruption requested by user (${signal})!`)
        if (this.locked) {
            Logger.warning("Sources are being modified, exiting once this step is complete")
            this.pending = true
        } else {
            this.terminate(INTERRUPTED_EXIT_CODE)
        }
    }

    public lock(): Guard {
        if (this.locked) {
            throw new Error("Recursive interrupt lock detected. This is forbidden.")
        }
        this.locked = true
        return new Guard(this)
    }

    /**
     * Runs `fn` with the guard held, releasing it on every exit path
     */
    public async guarded<T>(fn: () => Promise<T>): Promise<T> {
        const guard = this.lock()
        try {
            return await fn()
        } finally {
            guard.release()
        }
    }

    // Called by Guard.release()
    public unlock(): void {
        if (this.pending) {
            Logger.debug("An interrupt request will now be serviced")
            this.terminate(INTERRUPTED_EXIT_CODE)
        }
        this.locked = false
    }
}
