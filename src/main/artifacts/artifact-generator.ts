import type { DeviceState } from '../state/device-state';

/**
 * Derives files from a device document. Only ever invoked by the process holding the reload lock.
 */
export interface ArtifactGenerator {
  readonly name: string;
  appliesTo(device: DeviceState): boolean;
  /** Returns the names of the files produced, relative to the artifact directory. */
  generate(device: DeviceState): Promise<string[]>;
  /** True when every named file is still present. */
  outputsExist(files: readonly string[]): Promise<boolean>;
}
