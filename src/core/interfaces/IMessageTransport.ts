/**
 * Outbound messaging channel. Delivery failures are the transport's concern:
 * implementations log them and resolve.
 */
export interface IMessageTransport {
  deliver(recipientId: string, text: string): Promise<void>;
}
