/**
 * Toolchain inference by architecture.
 */
import type { PlatformArch } from './constants.js';

/**
 * Toolchains every board of an architecture can be built with.
 *
 * `arc` is left out: some ARC targets cannot be built with the GNU
 * toolchains and others lack MWDT compiler options, so ARC boards list
 * their toolchains explicitly. `xtensa` is left out because no single
 * toolchain covers every xtensa board.
 */
export const TOOLCHAIN_VARIANTS: Readonly<Partial<Record<PlatformArch, readonly string[]>>> = {
  arm: ['zephyr', 'gnuarmemb', 'xtools', 'armclang', 'llvm'],
  arm64: ['zephyr', 'cross-compile'],
  mips: ['zephyr', 'xtools'],
  nios2: ['zephyr', 'xtools'],
  riscv: ['zephyr', 'cross-compile'],
  posix: ['host', 'llvm'],
  sparc: ['zephyr', 'xtools'],
  x86: ['zephyr', 'xtools', 'llvm'],
};

export function getInferredToolchains(arch: PlatformArch): readonly string[] {
  return TOOLCHAIN_VARIANTS[arch] ?? [];
}

/**
 * Declared toolchains followed by the architecture's inferred ones.
 *
 * Only the inferred additions are de-duplicated; a declared list that
 * repeats an entry keeps the repetition.
 */
export function resolveSupportedToolchains(
  declared: readonly string[] | null | undefined,
  arch: PlatformArch
): string[] {
  const toolchains = [...(declared ?? [])];
  for (const toolchain of getInferredToolchains(arch)) {
    if (!toolchains.includes(toolchain)) {
      toolchains.push(toolchain);
    }
  }
  return toolchains;
}
