/**
 * Send primitive the dispatcher depends on.
 * Implementations resolve on delivery and reject with a TransportError (retryable | permanent) otherwise.
 */
export interface MessageTransport {
  send(address: string, text: string, mediaRefs: readonly string[]): Promise<void>;
}
