/**
 * A named execution backend a platform's binaries can run on.
 */
import { findExecutable } from '../../utils/file-system.js';
import { PlatformError, ErrorCodes } from '../../utils/errors.js';
import {
  ALWAYS_RUNNABLE_SIMULATOR,
  SUPPORTED_SIMULATORS,
  isSupportedSimulator,
  type SimulatorName,
} from './constants.js';

/** Raw simulator map as found in a platform file. */
export interface SimulatorData {
  name?: string | null;
  exec?: string | null;
}

export class Simulator {
  readonly name: SimulatorName;
  readonly exec?: string;

  /**
   * @throws PlatformError when `name` is missing or not a supported simulator kind
   */
  constructor(data: SimulatorData) {
    if (!data.name) {
      throw new PlatformError(
        ErrorCodes.MISSING_FIELD,
        'Simulator entry is missing required field "name"',
        { data }
      );
    }
    if (!isSupportedSimulator(data.name)) {
      throw new PlatformError(
        ErrorCodes.UNSUPPORTED_SIMULATOR,
        `Unsupported simulator "${data.name}" (expected one of: ${SUPPORTED_SIMULATORS.join(', ')})`,
        { name: data.name, supported: [...SUPPORTED_SIMULATORS] }
      );
    }
    this.name = data.name;
    if (data.exec != null) {
      this.exec = data.exec;
    }
  }

  /**
   * qemu is assumed to be installed. Any other simulator needs an `exec`
   * that resolves to an executable on PATH.
   */
  isRunnable(): boolean {
    if (this.name === ALWAYS_RUNNABLE_SIMULATOR) {
      return true;
    }
    if (!this.exec) {
      return false;
    }
    return findExecutable(this.exec) !== null;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Simulator)) {
      return false;
    }
    return this.name === other.name && this.exec === other.exec;
  }

  toString(): string {
    return `Simulator(name: ${this.name}, exec: ${this.exec ?? 'none'})`;
  }

  toJSON(): { name: SimulatorName; exec?: string } {
    return this.exec === undefined ? { name: this.name } : { name: this.name, exec: this.exec };
  }
}
