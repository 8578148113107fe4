import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const fixturesDir = dirname(fileURLToPath(import.meta.url));

export const transcriptFixturePath = (file: string): string =>
  join(fixturesDir, 'transcripts', file);
