/**
 * SHA-256 helpers for evidence files.
 */

import { createHash } from 'node:crypto';
import type { Readable } from 'node:stream';

export type HashType = 'md5' | 'sha1' | 'sha256';

const HASH_LENGTHS: Readonly<Record<number, HashType>> = { 32: 'md5', 40: 'sha1', 64: 'sha256' };
const HEX_PATTERN = /^[a-fA-F0-9]+$/;

export interface HashedContent {
  content: Buffer;
  sha256: string;                // lower-case hex
  size: number;                  // bytes
}

export function sha256Hex(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Drain a stream into memory, hashing it on the way.
 */
export async function readAndHash(stream: Readable): Promise<HashedContent> {
  const hash = createHash('sha256');
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk);
    hash.update(buffer);
    chunks.push(buffer);
    size += buffer.length;
  }

  return { content: Buffer.concat(chunks), sha256: hash.digest('hex'), size };
}

/** Digest type of a hex string, judged by its length. */
export function detectHashType(value: string): HashType | null {
  if (!HEX_PATTERN.test(value)) return null;
  return HASH_LENGTHS[value.length] ?? null;
}
