import type { CrawlHandlers, CrawlReport, OutputFormat } from '../../types.js';
import { writeReport } from '../../util/output.js';

export function createDefaultHandlers(format: OutputFormat): CrawlHandlers {
  return {
    onComplete: (report: CrawlReport) => writeReport(report, format),
  };
}
