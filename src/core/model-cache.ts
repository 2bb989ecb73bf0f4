/**
 * Host model cache
 *
 * The service's hub cache is bind-mounted from a host directory so
 * downloads survive container restarts. Cached files are only a hint for
 * log wording; the loaded-models listing decides whether a model is usable.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { MODEL_ID_SEPARATOR } from '../registry/response-extractor.js';

/**
 * Hub cache directory name for a model: `org/name` -> `models--org--name`
 */
export function modelCacheDirName(modelId: string): string {
  return `models--${modelId.replaceAll(MODEL_ID_SEPARATOR, '--')}`;
}

export class ModelCache {
  constructor(public readonly rootDir: string) {}

  /**
   * Create the cache root if absent.
   */
  public async ensureRoot(): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
  }

  public pathFor(modelId: string): string {
    return join(this.rootDir, modelCacheDirName(modelId));
  }

  /**
   * True when the model's cache directory exists and is non-empty.
   */
  public async hasCachedFiles(modelId: string): Promise<boolean> {
    try {
      const entries = await readdir(this.pathFor(modelId));
      return entries.length > 0;
    } catch {
      return false;
    }
  }
}
