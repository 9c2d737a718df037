import { writeFile } from 'fs/promises';
import { z } from 'zod';
import type { FileWriteResult } from '../../types/tools.js';
import { getErrorMessage } from '../../utils/error-handler.js';
import { createLogger } from '../../utils/logger.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const logger = createLogger('WriteFileTool');

const WriteFileSchema = z.object({
  filepath: z.string().describe('Path to the file'),
  content: z.string().describe('Content to write')
});

export const writeFileTool = wrapTool({
  name: 'file.write_file',
  description: 'Write content to a file',
  schema: WriteFileSchema,
  handler: async ({ filepath, content }): Promise<FileWriteResult> => {
    try {
      await writeFile(filepath, content, 'utf-8');
      logger.info({ filepath }, 'File written');

      return {
        filepath,
        content_length: [...content].length,
        timestamp: new Date().toISOString(),
        status: 'success'
      };
    } catch (error) {
      logger.warn({ filepath, error: getErrorMessage(error) }, 'Failed to write file');

      return {
        filepath,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
        status: 'error'
      };
    }
  }
});
