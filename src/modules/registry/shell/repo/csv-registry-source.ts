import { err } from 'neverthrow';

import { readTextFile } from '../../../../infra/files/index.js';
import { parseRegistryCsv } from '../../core/usecases/parse-registry.js';

import type { RegistrySource } from '../../core/ports.js';

export interface RegistrySourceOptions {
  filePath: string;
}

export const createRegistrySource = (options: RegistrySourceOptions): RegistrySource => ({
  async load() {
    const text = await readTextFile(options.filePath);
    if (text.isErr()) {
      return err(text.error);
    }

    return parseRegistryCsv(text.value);
  },
});
