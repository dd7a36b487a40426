/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Gunzip } from 'fflate';
import { toError } from './logger';

/**
 * Transform stream that inflates gzip data with fflate
 */
export function createGunzipStream(): Transform {
  const transform = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      try {
        inflater.push(chunk);
        callback();
      } catch (error) {
        callback(toError(error));
      }
    },
    flush(callback) {
      try {
        inflater.push(new Uint8Array(0), true);
        callback();
      } catch (error) {
        callback(toError(error));
      }
    },
  });

  const inflater = new Gunzip((data) => {
    transform.push(Buffer.from(data));
  });

  return transform;
}

/**
 * Decompress a gzip file into the target path (written in place)
 */
export async function gunzipFile(sourcePath: string, targetPath: string): Promise<void> {
  await pipeline(createReadStream(sourcePath), createGunzipStream(), createWriteStream(targetPath));
}
