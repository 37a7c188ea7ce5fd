/**
 * Port to the streaming transport that delivers quote messages.
 *
 * Authentication, reconnection and wire framing live behind this interface.
 * Messages for one subscription are delivered one at a time.
 */
export type MessageHandler = (message: unknown) => void;

export interface QuoteTransport {
  /** Starts streaming top-of-book messages for `symbol`; resolves to a subscription id. */
  subscribe(symbol: string, onMessage: MessageHandler): Promise<string>;
  unsubscribe(subscriptionId: string): Promise<void>;
}
