import { mcpConfig } from '../config/mcp.config.js';
import { ResponseEnvelopeSchema, type RequestEnvelope, type ResponseEnvelope } from '../types/mcp.js';
import { createLogger } from '../utils/logger.js';
import type { ClientTransport, RawMessageHandler } from './types.js';

const logger = createLogger('InProcessTransport');

/**
 * Stands in for a network hop: serializes the request, waits out an artificial
 * latency, hands the text to a server living in the same process and decodes
 * whatever comes back.
 */
export class InProcessTransport implements ClientTransport {
  constructor(
    private readonly handler: RawMessageHandler,
    private readonly latencyMs: number = mcpConfig.simulatedLatencyMs
  ) {}

  async send(request: RequestEnvelope): Promise<ResponseEnvelope> {
    const payload = JSON.stringify(request);
    logger.debug({ method: request.method, id: request.id }, 'Sending request');

    if (this.latencyMs > 0) {
      await this.delay(this.latencyMs);
    }

    const reply = await this.handler.handleRaw(payload);
    const decoded: unknown = JSON.parse(reply);

    return ResponseEnvelopeSchema.parse(decoded);
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
