import { z } from 'zod';
import type { EchoResult } from '../../types/tools.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const EchoSchema = z.object({
  message: z.string().describe('Message to echo')
});

export const echoTool = wrapTool({
  name: 'system.echo',
  description: 'Echo a message back',
  schema: EchoSchema,
  handler: ({ message }): EchoResult => ({
    message,
    timestamp: new Date().toISOString(),
    status: 'echoed'
  })
});
