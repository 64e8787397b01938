import { promises as fsp } from 'fs';
import path from 'path';
import { promisify } from 'util';
import { gzip } from 'zlib';
import { SinkError, errorMessage } from './errors';
import { serializeXmltv } from './serializer';
import { MergedDocument } from './types';
import { createLogger } from '../log';

const gzipAsync = promisify(gzip);
const log = createLogger('SINK');

/**
 * Serializes, gzips and writes the document. The bytes go to a temp file
 * beside `target` that is renamed over it only once fully written, so a
 * failed run leaves the previous artifact in place.
 */
export async function writeGzipped(doc: MergedDocument, target: string): Promise<number> {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  try {
    const data = await gzipAsync(Buffer.from(serializeXmltv(doc), 'utf8'));
    const handle = await fsp.open(tmp, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fsp.rename(tmp, target);
    return data.length;
  } catch (e) {
    await fsp.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      log.warn(`could not remove ${tmp}: ${errorMessage(rmErr)}`);
    });
    throw new SinkError(target, `failed to write ${target}: ${errorMessage(e)}`, { cause: e });
  }
}
