/***
 *
 *
 *  Kernel Version Model
 *
 */

import { BadVersionFormatError } from "../utils/errors"

const COMPONENT = /^[0-9]+$/

export class KernelVersion {

    constructor(
        readonly major: number,
        readonly minor: number,
        readonly micro: number = 0
    ) {
        if (!Number.isSafeInteger(major) || major < 1
            || !Number.isSafeInteger(minor) || minor < 0
            || !Number.isSafeInteger(micro) || micro < 0) {
            throw new BadVersionFormatError(`${major}.${minor}.${micro}`)
        }
    }

    /**
     * Accepts `X.Y` (target descriptors) and `X.Y.Z` (version markers)
     */
    public static parse(text: string): KernelVersion {
        const parts = text.split(".")
        if ((parts.length !== 2 && parts.length !== 3) || !parts.every(p => COMPONENT.test(p))) {
            throw new BadVersionFormatError(text)
        }
        const [major, minor, micro] = parts.map(p => Number.parseInt(p, 10))
        return new KernelVersion(major, minor, micro ?? 0)
    }

    /** `M.N`, the series the version belongs to */
    public get series(): string {
        return `${this.major}.${this.minor}`
    }

    public toString(): string {
        return `${this.major}.${this.minor}.${this.micro}`
    }

    public withMicro(micro: number): KernelVersion {
        return new KernelVersion(this.major, this.minor, micro)
    }

    public next(): KernelVersion {
        return this.withMicro(this.micro + 1)
    }

    public sameSeries(other: KernelVersion): boolean {
        return this.major === other.major && this.minor === other.minor
    }

    public compare(other: KernelVersion): number {
        return (this.major - other.major) || (this.minor - other.minor) || (this.micro - other.micro)
    }

    public equals(other: KernelVersion): boolean {
        return this.compare(other) === 0
    }
}
