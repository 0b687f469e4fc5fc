import process from 'node:process'
import type {Recipe} from '../types.js'

export type HostOs = 'linux' | 'mac' | 'win'

/** Maps every character outside `[A-Za-z0-9_]` to `_`. */
export function legalizeName(name: string): string {
  return name.replaceAll(/\W/g, '_')
}

/**
 * Builds a recipe name from a base name and qualifiers (host triple,
 * architecture, bias), e.g. `recipeName('llvm', 'x86_64-linux')` is
 * `llvm_x86_64_linux`.
 */
export function recipeName(base: string, ...qualifiers: string[]): string {
  return [base, ...qualifiers].map(part => legalizeName(part)).join('_')
}

/** One recipe set per host triple, concatenated in host order. */
export function forEachHost(hosts: readonly string[], factory: (host: string) => Recipe[]): Recipe[] {
  return hosts.flatMap(host => factory(host))
}

const archPrefixes: Record<string, string> = {
  'x86-32': 'i686',
  'x86-64': 'x86_64',
  arm: 'armv7',
  arm64: 'aarch64',
  mips32: 'mipsel'
}

const osSuffixes: Record<HostOs, string> = {
  linux: 'linux',
  mac: 'apple-darwin',
  win: 'w64-mingw32'
}

/** Host triple for an OS / architecture pair, e.g. (`win`, `x86-32`) is `i686-w64-mingw32`. */
export function platformTriple(os: HostOs, arch: string): string {
  const prefix = archPrefixes[arch] ?? arch
  return `${prefix}-${osSuffixes[os]}`
}

/** Host triple of the running machine. */
export function currentPlatformTriple(): string {
  const os: HostOs = process.platform === 'darwin' ? 'mac' : (process.platform === 'win32' ? 'win' : 'linux')
  const arch = process.arch === 'x64' ? 'x86-64' : (process.arch === 'ia32' ? 'x86-32' : process.arch)
  return platformTriple(os, arch)
}

export function isWindowsTriple(triple: string): boolean {
  return triple.includes('-mingw32')
}

export function isCygwinTriple(triple: string): boolean {
  return triple.includes('-cygwin')
}

export function isLinuxTriple(triple: string): boolean {
  return triple.includes('-linux')
}

export function isMacTriple(triple: string): boolean {
  return triple.includes('-darwin')
}

export function isX8664Triple(triple: string): boolean {
  return triple.startsWith('x86_64')
}

/** OS family of a triple, used to name package targets such as `linux_x86`. */
export function tripleOs(triple: string): HostOs {
  if (isWindowsTriple(triple) || isCygwinTriple(triple)) {
    return 'win'
  }

  return isMacTriple(triple) ? 'mac' : 'linux'
}

/** Executable file name on the given host. */
export function executableName(name: string, host: string): string {
  return isWindowsTriple(host) ? `${name}.exe` : name
}
