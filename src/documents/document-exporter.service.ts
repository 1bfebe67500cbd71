import { mkdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Document, Packer, Paragraph } from 'docx';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export interface GeneratedDocument {
  buffer: Buffer;
  filename: string;
  mimeType: string;
}

export interface ExportedDocument extends GeneratedDocument {
  filePath: string;
}

@Injectable()
export class DocumentExporterService {
  private readonly exportDir: string;

  constructor(
    config: ConfigService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {
    this.exportDir = config.get<string>('EXPORT_DIR') || tmpdir();
  }

  /** One plain paragraph per line; no headings or tables. */
  async render(text: string, filename: string): Promise<GeneratedDocument> {
    const doc = new Document({
      sections: [
        {
          properties: {},
          children: text.split(/\r?\n/).map((line) => new Paragraph({ text: line })),
        },
      ],
    });

    return {
      buffer: await Packer.toBuffer(doc),
      filename,
      mimeType: DOCX_MIME_TYPE,
    };
  }

  /**
   * Writes `<documentType>_<userId>_<timestamp>.docx` into EXPORT_DIR.
   * Filesystem errors propagate to the caller.
   */
  async export(
    text: string,
    userId: string,
    documentType = 'document',
  ): Promise<ExportedDocument> {
    const safeUser = userId.replace(/[^\w-]/g, '_');
    const filename = `${documentType}_${safeUser}_${Date.now()}.docx`;
    const generated = await this.render(text, filename);

    await mkdir(this.exportDir, { recursive: true });
    const filePath = join(this.exportDir, filename);
    await writeFile(filePath, generated.buffer);

    await this.logger.log(`📄 exported ${filename} (${generated.buffer.length} bytes)`);
    return { ...generated, filePath };
  }
}
