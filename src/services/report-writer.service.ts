import fs from 'fs/promises';
import path from 'path';
import { logger } from '@/utils/logger';
import { ReportWriteError } from '@/services/base/errors';
import { OutputFormat } from '@/services/report/types';

export const FILE_EXTENSIONS: Readonly<Record<OutputFormat, string>> = Object.freeze({
  html: 'html',
  json: 'json',
  grep: 'grep'
});

/**
 * Writes report files into one output directory
 */
export class ReportWriterService {
  private logger = logger.child({ service: 'ReportWriterService' });
  private stylesheet: Promise<string | undefined> | null = null;

  constructor(
    private readonly outputDir: string,
    private readonly stylesheetPath: string
  ) {}

  /**
   * Stylesheet inlined into every HTML report, read once per run.
   * A missing file leaves the reports unstyled.
   */
  loadStylesheet(): Promise<string | undefined> {
    if (!this.stylesheet) {
      this.stylesheet = fs.readFile(this.stylesheetPath, 'utf8').catch((error: unknown) => {
        this.logger.warn(`Could not read stylesheet ${this.stylesheetPath}, HTML reports will be unstyled`, {
          error: error instanceof Error ? error.message : String(error)
        });
        return undefined;
      });
    }
    return this.stylesheet;
  }

  /**
   * Path a report file will be written to
   */
  filePath(baseName: string, format: OutputFormat): string {
    return path.join(this.outputDir, `${baseName}.${FILE_EXTENSIONS[format]}`);
  }

  async write(baseName: string, format: OutputFormat, content: string): Promise<string> {
    const filePath = this.filePath(baseName, format);
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ReportWriteError(`Could not write ${filePath}: ${String(error)}`, filePath, cause);
    }
    this.logger.debug(`Wrote ${filePath}`);
    return filePath;
  }
}
