import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { FileReadResult } from '../../types/tools.js';
import { getErrorMessage, hasErrorCode } from '../../utils/error-handler.js';
import { createLogger } from '../../utils/logger.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const logger = createLogger('ReadFileTool');

// Malformed UTF-8 is a read failure, not replacement characters.
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const ReadFileSchema = z.object({
  filepath: z.string().describe('Path to the file')
});

export const readFileTool = wrapTool({
  name: 'file.read_file',
  description: 'Read contents of a file',
  schema: ReadFileSchema,
  handler: async ({ filepath }): Promise<FileReadResult> => {
    try {
      const content = utf8.decode(await readFile(filepath));

      return {
        filepath,
        content,
        size: [...content].length,
        timestamp: new Date().toISOString(),
        status: 'success'
      };
    } catch (error) {
      const message = hasErrorCode(error, 'ENOENT') ? 'File not found' : getErrorMessage(error);
      logger.warn({ filepath, error: message }, 'Failed to read file');

      return {
        filepath,
        error: message,
        timestamp: new Date().toISOString(),
        status: 'error'
      };
    }
  }
});
