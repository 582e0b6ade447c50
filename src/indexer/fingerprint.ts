/**
 * Document Fingerprint Tracker
 *
 * Compares what is on disk with the records of the last ingestion:
 * - added: no record for the path
 * - modified: record exists, signature differs
 * - removed: record exists, file is gone (or now ignored)
 * - unchanged: signature matches, nothing to do
 *
 * diff() never writes. The pipeline commits a record only once the
 * document's chunks are stored, so an interrupted run re-processes the
 * document next time.
 */

import { readFile } from 'node:fs/promises';

import type { FingerprintRecord } from '../database/index.js';
import { sha256Hex } from '../utils/index.js';
import { scanDocuments } from './scanner.js';
import type { DocumentInfo, ScanOptions } from './types.js';

/**
 * content-hash reads every file but survives copies that reset mtimes;
 * mtime-size only stats.
 */
export type FingerprintStrategy = 'content-hash' | 'mtime-size';

export interface DocumentChange {
  document: DocumentInfo;
  signature: string;
  /** Present for modified documents */
  previous?: FingerprintRecord;
}

export interface FingerprintDiff {
  added: DocumentChange[];
  modified: DocumentChange[];
  removed: FingerprintRecord[];
  unchanged: DocumentChange[];
  /** Found by the scan but could not be read for hashing */
  unreadable: Array<{ document: DocumentInfo; error: Error }>;
}

export async function computeSignature(
  document: DocumentInfo,
  strategy: FingerprintStrategy
): Promise<string> {
  if (strategy === 'mtime-size') {
    return `stat:${document.size}:${document.mtimeMs}`;
  }
  return `sha256:${sha256Hex(await readFile(document.path))}`;
}

export interface FingerprintTrackerOptions {
  strategy: FingerprintStrategy;
  scan?: ScanOptions;
}

export class FingerprintTracker {
  constructor(private readonly options: FingerprintTrackerOptions) {}

  get strategy(): FingerprintStrategy {
    return this.options.strategy;
  }

  async diff(projectPath: string, stored: ReadonlyMap<string, FingerprintRecord>): Promise<FingerprintDiff> {
    const documents = await scanDocuments(projectPath, this.options.scan);
    const result: FingerprintDiff = { added: [], modified: [], removed: [], unchanged: [], unreadable: [] };
    const seen = new Set<string>();

    for (const document of documents) {
      seen.add(document.relativePath);
      const previous = stored.get(document.relativePath);

      let signature: string;
      try {
        signature = await computeSignature(document, this.options.strategy);
      } catch (error) {
        result.unreadable.push({
          document,
          error: error instanceof Error ? error : new Error(String(error)),
        });
        continue;
      }

      if (!previous) {
        result.added.push({ document, signature });
      } else if (previous.signature !== signature) {
        result.modified.push({ document, signature, previous });
      } else {
        result.unchanged.push({ document, signature, previous });
      }
    }

    for (const [filePath, record] of stored) {
      // Unreadable files still exist; keep their chunks until they can be read
      if (!seen.has(filePath)) {
        result.removed.push(record);
      }
    }

    return result;
  }
}
