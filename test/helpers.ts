/**
 * Test utilities: an in-process transport, a recording channel and polling
 * helpers.
 */

import { Socket } from '../src/Socket.ts';
import { NotConnectedError } from '../src/errors.ts';
import { decodeEnvelope } from '../src/wire.ts';
import type { Envelope } from '../src/wire.ts';
import type { SocketChannel, SocketOptions } from '../src/types.ts';
import type {
  SocketTransport,
  TransportDelegate,
  TransportState,
} from '../src/transports/SocketTransport.ts';

export const TEST_URL = 'ws://example.test/socket/websocket';

/**
 * Transport driven by the test instead of a network.
 */
export class FakeTransport implements SocketTransport {
  state: TransportState = 'closed';
  url: string | null = null;
  delegate: TransportDelegate | null = null;
  sent: string[] = [];
  openCalls = 0;
  closeCalls = 0;

  setURL(url: string): void {
    this.url = url;
  }

  setDelegate(delegate: TransportDelegate | null): void {
    this.delegate = delegate;
  }

  open(): void {
    this.openCalls++;
    this.state = 'connecting';
  }

  close(): void {
    this.closeCalls++;
    this.state = 'closed';
  }

  send(text: string): void {
    if (this.state !== 'open') {
      throw new NotConnectedError(`Cannot send, transport is ${this.state}`);
    }
    this.sent.push(text);
  }

  get sentEnvelopes(): Envelope[] {
    return this.sent.map((text) => decodeEnvelope(text));
  }

  simulateOpen(): void {
    this.state = 'open';
    this.delegate?.didOpen();
  }

  simulateMessage(text: string): void {
    this.delegate?.didReceive(text);
  }

  simulateError(message: string): void {
    this.state = 'closed';
    this.delegate?.didError(message);
  }

  simulateClose(reason: string, code = 1006): void {
    this.state = 'closed';
    this.delegate?.didClose(code, reason, code === 1000);
  }
}

/**
 * Records every transport the socket creates.
 */
export class FakeTransportFactory {
  readonly transports: FakeTransport[] = [];

  create = (): FakeTransport => {
    const transport = new FakeTransport();
    this.transports.push(transport);
    return transport;
  };

  get count(): number {
    return this.transports.length;
  }

  at(index: number): FakeTransport {
    const transport = this.transports[index];
    if (!transport) {
      throw new Error(`No transport #${index} (created ${this.transports.length})`);
    }
    return transport;
  }

  get last(): FakeTransport {
    return this.at(this.transports.length - 1);
  }
}

export interface TestSocket {
  socket: Socket;
  transports: FakeTransportFactory;
  taskErrors: Error[];
}

/**
 * Create a socket on fake transports. Heartbeats are off and the reconnect
 * delay is long unless the options say otherwise.
 */
export function createTestSocket(options: SocketOptions = {}): TestSocket {
  const transports = new FakeTransportFactory();
  const taskErrors: Error[] = [];
  const socket = new Socket(TEST_URL, {
    heartbeatIntervalMs: 0,
    reconnectDelayMs: 10_000,
    onTaskError: (err) => taskErrors.push(err),
    ...options,
    createTransport: transports.create,
  });
  return { socket, transports, taskErrors };
}

/**
 * Create a socket and bring its first transport to `open`.
 */
export async function createOpenSocket(options: SocketOptions = {}): Promise<TestSocket> {
  const testSocket = createTestSocket(options);
  await testSocket.socket.connect();
  testSocket.transports.last.simulateOpen();
  await testSocket.socket.idle();
  return testSocket;
}

export interface RecordedEvent {
  event: string;
  payload: unknown;
  ref: number | null;
}

/**
 * Channel that only records what the socket routes to it.
 */
export class RecordingChannel implements SocketChannel {
  readonly topic: string;
  readonly events: RecordedEvent[] = [];

  constructor(topic: string) {
    this.topic = topic;
  }

  triggerEvent(event: string, payload: unknown, ref: number | null): void {
    this.events.push({ event, payload, ref });
  }
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 10)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}
