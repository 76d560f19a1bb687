import { Inject, Injectable } from '@nestjs/common';
import fs from 'fs/promises';
import path from 'path';
import { SERVICE_CONFIG } from './tokens';
import { ServiceConfig } from './config/service.config';

/**
 * Raw upload area. Files are keyed by their original name, so a second upload
 * with the same name replaces the first.
 */
@Injectable()
export class UploadStorage {
  constructor(@Inject(SERVICE_CONFIG) private readonly config: ServiceConfig) {}

  async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.config.uploadDir, { recursive: true });
  }

  /** Directory components are dropped from the name before it is used as a key. */
  pathFor(filename: string): string {
    const base = path.basename(filename.replace(/\\/g, '/'));
    const usable = base !== '' && base !== '.' && base !== '..';
    return path.join(this.config.uploadDir, usable ? base : 'upload');
  }

  async save(filename: string, bytes: Buffer): Promise<string> {
    await this.ensureDirectory();
    const filePath = this.pathFor(filename);
    await fs.writeFile(filePath, bytes);
    return filePath;
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
