/**
 * Disk Artifact Store
 *
 * Writes export artifacts (and the archive) into one output directory.
 */

import { promises as fs } from 'fs';
import { basename, join, resolve } from 'path';
import type { ExportArtifact } from '@wexport/core';
import { StorageError, createLogger, describeError } from '@wexport/utils';

const log = createLogger('storage:disk');

export interface PrepareOptions {
  /**
   * Remove everything already in the directory
   * @default false
   */
  clean?: boolean;
}

export class DiskArtifactStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  /**
   * Create the output directory, optionally emptying it first
   */
  async prepare(options: PrepareOptions = {}): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      if (options.clean) {
        const entries = await fs.readdir(this.directory);
        await Promise.all(
          entries.map((entry) => fs.rm(join(this.directory, entry), { recursive: true, force: true }))
        );
        log.debug('Cleaned output directory', { directory: this.directory, removed: entries.length });
      }
    } catch (error) {
      throw new StorageError(
        `Could not prepare output directory ${this.directory}: ${describeError(error)}`,
        'prepare',
        { directory: this.directory }
      );
    }
  }

  pathFor(name: string): string {
    if (name === '' || basename(name) !== name || name === '.' || name === '..') {
      throw new StorageError(`Invalid artifact name: ${name}`, 'write', { artifact: name });
    }
    return join(this.directory, name);
  }

  /**
   * @returns absolute path of the written file
   */
  async write(artifact: ExportArtifact): Promise<string> {
    const target = this.pathFor(artifact.name);
    try {
      await fs.writeFile(target, artifact.bytes);
    } catch (error) {
      throw new StorageError(
        `Could not write ${artifact.name}: ${describeError(error)}`,
        'write',
        { artifact: artifact.name, directory: this.directory }
      );
    }
    log.debug('Wrote artifact', { artifact: artifact.name, bytes: artifact.bytes.byteLength });
    return target;
  }

  async writeAll(artifacts: readonly ExportArtifact[]): Promise<string[]> {
    const paths: string[] = [];
    for (const artifact of artifacts) {
      paths.push(await this.write(artifact));
    }
    return paths;
  }
}
