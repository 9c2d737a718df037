import { z } from 'zod';
import type { SystemInfoResult } from '../../types/tools.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

export const getSystemInfoTool = wrapTool({
  name: 'system.get_system_info',
  description: 'Get basic system information',
  schema: z.object({}),
  handler: (): SystemInfoResult => ({
    platform: process.platform,
    current_directory: process.cwd(),
    timestamp: new Date().toISOString(),
    runtime_version: process.versions.node
  })
});
