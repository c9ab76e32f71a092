/**
 * Minimal JSON-RPC transport for DAS-API hosts
 */

import {
  ResponseDecodeError,
  ResponseStatusCodeError,
  TransportError,
} from "./errors";
import { parseJson } from "./json";

/**
 * Anything that can POST a serialized JSON-RPC body and return the decoded
 * response. The comparison engine depends on this, not on fetch, so tests
 * can substitute an in-memory host.
 */
export interface JsonRpcTransport {
  makeRequest(url: string, body: string): Promise<unknown>;
}

export class DasApiClient implements JsonRpcTransport {
  /**
   * POST `body` to `url`.
   *
   * @throws TransportError when the host cannot be reached
   * @throws ResponseStatusCodeError on any status other than 200 (body unread)
   * @throws ResponseDecodeError when a 200 body is not JSON
   *
   * Numbers in the reply are `LosslessNumber` values.
   */
  async makeRequest(url: string, body: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
      });
    } catch (error) {
      throw new TransportError(url, error);
    }

    if (response.status !== 200) {
      // Release the socket without reading the payload
      await response.body?.cancel();
      throw new ResponseStatusCodeError(url, response.status);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(url, error);
    }

    try {
      return parseJson(text);
    } catch (error) {
      throw new ResponseDecodeError(url, error);
    }
  }
}
