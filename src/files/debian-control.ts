/***
 *
 *
 *  Debian Control File for the Kernel Meta-Package
 *
 */

export interface KernelMetaPackage {
    // linux-image-<M>.<N>-<target>
    package: string
    debianArch: string
    maintainer: string
    series: string
    targetName: string
    // Full version of the linux-image package this one depends on
    version: string
}

export const DEBIAN_CONTROL = function(meta: KernelMetaPackage): string {
    return `Package: ${meta.package}
Architecture: ${meta.debianArch}
Maintainer: ${meta.maintainer}
Description: Linux kernel, version ${meta.series}.z for ${meta.targetName}
 This is a meta-package allowing to manage updates of the Linux kernel
 for the ${meta.targetName}
Depends: linux-image-${meta.version}
Version: ${meta.version}
Section: custom/kernel
Priority: required
`
}
