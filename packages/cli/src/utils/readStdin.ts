/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FatalInputError } from '@shellward/core';

export const MAX_STDIN_BYTES = 1024 * 1024;

/**
 * Reads a stream to the end as UTF-8 text.
 *
 * @throws FatalInputError when the input is larger than `maxBytes`
 */
export async function readStdin(
  stream: AsyncIterable<string | Buffer>,
  maxBytes: number = MAX_STDIN_BYTES,
): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    total += buffer.length;
    if (total > maxBytes) {
      throw new FatalInputError(`Hook input exceeds ${maxBytes} bytes`);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}
