/**
 * Export output: one JSONL file per stream plus JSON side files (manifest, catalog).
 */

import { mkdirSync, writeFileSync, appendFileSync } from 'fs';
import { join } from 'path';
import ora, { type Ora } from 'ora';

/**
 * Create the output directory and an empty `<stream>.jsonl` per stream.
 * Returns stream name → file path.
 */
export function setupExport(outDir: string, streams: readonly string[]): Record<string, string> {
  mkdirSync(outDir, { recursive: true });

  const paths: Record<string, string> = {};
  for (const stream of streams) {
    const filePath = join(outDir, `${stream}.jsonl`);
    writeFileSync(filePath, '');
    paths[stream] = filePath;
  }
  return paths;
}

/** Append a single record as a JSONL line. */
export function appendJsonl(filePath: string, record: unknown): void {
  appendFileSync(filePath, JSON.stringify(record) + '\n');
}

/** Write pretty-printed JSON to outDir/filename and return the path. */
export function writeJson(outDir: string, filename: string, data: unknown): string {
  const filePath = join(outDir, filename);
  writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n');
  return filePath;
}

/** Create a labeled ora spinner; silent when stderr is not a terminal. */
export function exportSpinner(label: string): Ora {
  return ora({ text: label, isSilent: !process.stderr.isTTY }).start();
}
