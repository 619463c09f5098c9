#!/usr/bin/env node
/***
 *
 *
 *  Main Entry Point for the Application
 *
 */

import { main } from "./cli"
import { Interrupt } from "./utils/interrupt"

const interrupt = new Interrupt()
interrupt.install()

main(process.argv, { interrupt })
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
        console.error(err)
        process.exit(2)
    })
