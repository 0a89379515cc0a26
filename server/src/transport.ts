/**
 * Message transport. The session only sees parsed JSON-RPC messages; the
 * framing is left to vscode-jsonrpc's stream reader and writer.
 */
import {
  Message,
  type NotificationMessage,
  type ResponseMessage,
  StreamMessageReader,
  StreamMessageWriter,
} from "vscode-languageserver/node";

import { Readable, Writable } from "stream";

export type MessageId = number | string | null;
export type ResultValue = ResponseMessage["result"];
export type NotificationParams = NotificationMessage["params"];

export interface Transport {
  /** Next message, or `undefined` once the input is closed and drained. */
  receive(): Promise<Message | undefined>;
  reply(id: MessageId, result: ResultValue): void;
  notify(method: string, params: NotificationParams): void;
  error(id: MessageId, code: number, message: string): void;
  closed(): boolean;
}

/**
 * Queues messages as the reader parses them so the session can pull them
 * one at a time. Writes are chained to keep outgoing order.
 */
export class StreamTransport implements Transport {
  private readonly reader: StreamMessageReader;
  private readonly writer: StreamMessageWriter;
  private readonly queue: Message[] = [];
  private waiter: ((msg: Message | undefined) => void) | undefined;
  private inputClosed = false;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    input: Readable,
    output: Writable,
    private readonly onFailure: (err: unknown) => void,
  ) {
    this.reader = new StreamMessageReader(input);
    this.writer = new StreamMessageWriter(output);

    this.reader.onError((err) => this.onFailure(err));
    this.reader.onClose(() => this.closeInput());
    this.writer.onError(([err]) => this.onFailure(err));
    this.reader.listen((msg) => this.push(msg));
  }

  receive(): Promise<Message | undefined> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.inputClosed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  reply(id: MessageId, result: ResultValue): void {
    const msg: ResponseMessage = { jsonrpc: "2.0", id, result };
    this.send(msg);
  }

  notify(method: string, params: NotificationParams): void {
    const msg: NotificationMessage = { jsonrpc: "2.0", method, params };
    this.send(msg);
  }

  error(id: MessageId, code: number, message: string): void {
    const msg: ResponseMessage = { jsonrpc: "2.0", id, error: { code, message } };
    this.send(msg);
  }

  closed(): boolean {
    return this.inputClosed && this.queue.length === 0;
  }

  /** Resolves once every message handed to the transport so far is written. */
  flush(): Promise<void> {
    return this.writes;
  }

  dispose(): void {
    this.reader.dispose();
    this.writer.dispose();
  }

  private send(msg: Message): void {
    this.writes = this.writes.then(() => this.writer.write(msg)).catch((err: unknown) => this.onFailure(err));
  }

  private push(msg: Message): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(msg);
      return;
    }
    this.queue.push(msg);
  }

  private closeInput(): void {
    this.inputClosed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(undefined);
    }
  }
}
