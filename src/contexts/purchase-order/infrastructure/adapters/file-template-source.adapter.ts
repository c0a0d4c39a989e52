import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'fs/promises';
import path from 'path';
import type { TemplateFile, TemplateSourcePort } from '../../application/ports';
import { TemplateLoadException } from '../../application/errors/purchase-order.errors';

/**
 * Reads the bundled template from PO_TEMPLATE_PATH (relative to the working directory)
 */
@Injectable()
export class FileTemplateSourceAdapter implements TemplateSourcePort {
  constructor(private readonly configService: ConfigService) {}

  async loadBundled(): Promise<TemplateFile | null> {
    const configured = this.configService.get<string>('PO_TEMPLATE_PATH')?.trim();
    if (!configured) return null;

    const filePath = path.resolve(process.cwd(), configured);
    try {
      const buffer = await fs.readFile(filePath);
      return { buffer, fileName: path.basename(filePath) };
    } catch (error) {
      throw new TemplateLoadException(`Bundled template "${configured}" could not be read`, error);
    }
  }
}
