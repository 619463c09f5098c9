/***
 *
 *  tcbkit Version Detection
 *
 */

const envVersion = process.env.TCBKIT_VERSION?.trim()

// Default to the development version when no build-time override is provided
export const TCBKIT_VERSION = envVersion && envVersion.length > 0 ? envVersion : "0.1.0"
