import { INTERRUPTED_EXIT_CODE, Interrupt } from "../src/utils/interrupt"

class Terminated extends Error {
    constructor(readonly code: number) {
        super(`terminated with code ${code}`)
    }
}

function terminate(code: number): never {
    throw new Terminated(code)
}

describe("Interrupt", () => {
    let interrupt: Interrupt

    beforeEach(() => {
        interrupt = new Interrupt(terminate)
    })

    test("terminates right away when nothing is guarded", () => {
        expect(() => interrupt.handleSignal("SIGINT")).toThrow(new Terminated(INTERRUPTED_EXIT_CODE))
        expect(INTERRUPTED_EXIT_CODE).toBe(255)
    })

    test("latches a signal received while locked and terminates on release", () => {
        const guard = interrupt.lock()
        interrupt.handleSignal("SIGINT")
        expect(interrupt.isPending).toBe(true)
        expect(interrupt.isLocked).toBe(true)
        expect(() => guard.release()).toThrow(Terminated)
    })

    test("releasing without a pending signal unlocks", () => {
        const guard = interrupt.lock()
        guard.release()
        expect(interrupt.isLocked).toBe(false)
        // A second release is a no-op
        guard.release()
        expect(interrupt.isLocked).toBe(false)
        expect(() => interrupt.lock().release()).not.toThrow()
    })

    test("recursive locking is forbidden", () => {
        interrupt.lock()
        expect(() => interrupt.lock()).toThrow("Recursive interrupt lock detected. This is forbidden.")
    })

    test("guarded releases when the block fails", async () => {
        await expect(interrupt.guarded(async () => {
            throw new Error("boom")
        })).rejects.toThrow("boom")
        expect(interrupt.isLocked).toBe(false)
    })

    test("guarded returns the block's value", async () => {
        await expect(interrupt.guarded(async () => 42)).resolves.toBe(42)
        expect(interrupt.isLocked).toBe(false)
    })

    test("guarded terminates after the block when a signal arrived meanwhile", async () => {
        const steps: string[] = []
        await expect(interrupt.guarded(async () => {
            steps.push("start")
            interrupt.handleSignal("SIGTERM")
            steps.push("end")
        })).rejects.toThrow(Terminated)
        expect(steps).toEqual(["start", "end"])
    })

    test("install hooks the given signals", () => {
        const before = process.listenerCount("SIGUSR2")
        interrupt.install(["SIGUSR2"])
        interrupt.install(["SIGUSR2"])
        try {
            expect(process.listenerCount("SIGUSR2")).toBe(before + 1)
            const guard = interrupt.lock()
            process.emit("SIGUSR2", "SIGUSR2")
            expect(interrupt.isPending).toBe(true)
            expect(() => guard.release()).toThrow(Terminated)
        } finally {
            process.removeAllListeners("SIGUSR2")
        }
    })
})
