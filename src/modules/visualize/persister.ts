import fs from 'node:fs';
import { getLogger } from '../../utils/logger.js';

const log = getLogger();

/** Write the report verbatim as UTF-8, replacing any existing file. */
export function saveHtml(filePath: string, html: string): void {
  fs.writeFileSync(filePath, html, 'utf-8');
  log.info({ filePath, bytes: Buffer.byteLength(html, 'utf-8') }, 'Report saved');
}
