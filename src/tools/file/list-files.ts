import { readdir, stat } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { FileEntry, ListFilesResult } from '../../types/tools.js';
import { getErrorMessage } from '../../utils/error-handler.js';
import { createLogger } from '../../utils/logger.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const logger = createLogger('ListFilesTool');

const ListFilesSchema = z.object({
  directory: z.string().describe('Directory path').default('.')
});

async function describeEntry(directory: string, name: string): Promise<FileEntry> {
  try {
    const stats = await stat(path.join(directory, name));

    return {
      name,
      is_directory: stats.isDirectory(),
      size: stats.isFile() ? stats.size : null
    };
  } catch (error) {
    // Dangling symlinks and entries removed mid-listing are neither files nor directories.
    logger.debug({ directory, name, error: getErrorMessage(error) }, 'Could not stat entry');
    return { name, is_directory: false, size: null };
  }
}

export const listFilesTool = wrapTool({
  name: 'file.list_files',
  description: 'List files in a directory',
  schema: ListFilesSchema,
  handler: async ({ directory }): Promise<ListFilesResult> => {
    try {
      const names = await readdir(directory);
      const files = await Promise.all(names.map(name => describeEntry(directory, name)));

      return {
        directory,
        files,
        count: files.length,
        timestamp: new Date().toISOString(),
        status: 'success'
      };
    } catch (error) {
      logger.warn({ directory, error: getErrorMessage(error) }, 'Failed to list directory');

      return {
        directory,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
        status: 'error'
      };
    }
  }
});
