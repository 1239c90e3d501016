import { describe, it, expect } from 'vitest';
import {
  getInferredToolchains,
  resolveSupportedToolchains,
  TOOLCHAIN_VARIANTS,
} from '../../../../src/core/platform/toolchains.js';

describe('toolchains', () => {
  describe('getInferredToolchains', () => {
    it('should return the table entry for a listed architecture', () => {
      expect(getInferredToolchains('posix')).toEqual(['host', 'llvm']);
      expect(getInferredToolchains('riscv')).toEqual(['zephyr', 'cross-compile']);
    });

    it('should return nothing for architectures left out of the table', () => {
      expect(getInferredToolchains('arc')).toEqual([]);
      expect(getInferredToolchains('xtensa')).toEqual([]);
      expect(getInferredToolchains('unit')).toEqual([]);
    });

    it('should cover exactly the inferable architectures', () => {
      expect(Object.keys(TOOLCHAIN_VARIANTS).sort()).toEqual(
        ['arm', 'arm64', 'mips', 'nios2', 'posix', 'riscv', 'sparc', 'x86']
      );
    });
  });

  describe('resolveSupportedToolchains', () => {
    it('should append inferred toolchains without duplicating declared ones', () => {
      expect(resolveSupportedToolchains(['zephyr'], 'arm')).toEqual(
        ['zephyr', 'gnuarmemb', 'xtools', 'armclang', 'llvm']
      );
    });

    it('should keep declared toolchains first', () => {
      expect(resolveSupportedToolchains(['llvm', 'oneApi'], 'x86')).toEqual(
        ['llvm', 'oneApi', 'zephyr', 'xtools']
      );
    });

    it('should treat null and undefined as an empty declaration', () => {
      expect(resolveSupportedToolchains(null, 'arc')).toEqual([]);
      expect(resolveSupportedToolchains(undefined, 'mips')).toEqual(['zephyr', 'xtools']);
    });

    it('should use only the declared list for arc', () => {
      expect(resolveSupportedToolchains(['zephyr', 'arcmwdt'], 'arc')).toEqual(['zephyr', 'arcmwdt']);
    });

    it('should keep duplicates that are already in the declared list', () => {
      expect(resolveSupportedToolchains(['zephyr', 'zephyr'], 'arm64')).toEqual(
        ['zephyr', 'zephyr', 'cross-compile']
      );
    });

    it('should not mutate the declared list', () => {
      const declared = ['zephyr'];
      resolveSupportedToolchains(declared, 'sparc');

      expect(declared).toEqual(['zephyr']);
    });
  });
});
