import { err } from 'neverthrow';

import { readTextFile } from '../../../../infra/files/index.js';
import { parsePowerFeedCsv } from '../../core/usecases/parse-power-feed.js';

import type { PowerFeedSource } from '../../core/ports.js';

export interface PowerFeedSourceOptions {
  filePath: string;
}

export const createPowerFeedSource = (options: PowerFeedSourceOptions): PowerFeedSource => ({
  async load() {
    const text = await readTextFile(options.filePath);
    if (text.isErr()) {
      return err(text.error);
    }

    return parsePowerFeedCsv(text.value);
  },
});
