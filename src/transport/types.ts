import type { RequestEnvelope, ResponseEnvelope } from '../types/mcp.js';

/**
 * One request, one response. A transport rejects when the round trip itself
 * fails (unreachable peer, undecodable reply); protocol errors come back as
 * error envelopes.
 */
export interface ClientTransport {
  send(request: RequestEnvelope): Promise<ResponseEnvelope>;
}

/** Anything that answers JSON-RPC text with JSON-RPC text. */
export interface RawMessageHandler {
  handleRaw(payload: string): Promise<string>;
}
