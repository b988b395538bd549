import { createConnection } from "node:net";
import type { Duplex } from "node:stream";
import { DEFAULT_MAX_FRAME_BYTES, FrameAccumulator } from "../codec/frame";
import { ConnectionError, FrameError } from "../core/errors";

export type Endpoint = { host: string; port: number };

export type ReadResult =
  | { kind: "frame"; frame: Uint8Array }
  | { kind: "timeout" }
  | { kind: "closed"; error: ConnectionError | FrameError };

/** One participant's link to the coordinator. Single reader, single writer. */
export interface Connection {
  readonly open: boolean;
  /** Waits at most `timeoutMs`; a timeout never drops buffered bytes. */
  readFrame(timeoutMs: number): Promise<ReadResult>;
  write(frame: Uint8Array): Promise<void>;
  close(): void;
  destroy(): void;
}

/** Must give up, and release any half-open socket, once `signal` aborts. */
export type Connector = (endpoint: Endpoint, signal?: AbortSignal) => Promise<Connection>;

export class StreamConnection implements Connection {
  private readonly frames: FrameAccumulator;
  private wake?: () => void;
  private failure?: ConnectionError | FrameError;
  private ended = false;

  constructor(private readonly stream: Duplex, maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {
    this.frames = new FrameAccumulator(maxFrameBytes);
    stream.on("data", (chunk: Buffer) => {
      this.frames.push(chunk);
      this.notify();
    });
    stream.on("end", () => {
      this.ended = true;
      this.notify();
    });
    stream.on("close", () => {
      this.ended = true;
      this.notify();
    });
    stream.on("error", (e: Error) => {
      this.failure ??= ConnectionError.fromSocket(e);
      this.notify();
    });
  }

  get open(): boolean {
    return !this.ended && this.failure === undefined && !this.stream.destroyed;
  }

  async readFrame(timeoutMs: number): Promise<ReadResult> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const next = this.frames.next();
      if (!next.ok) {
        this.failure = next.error;
        this.stream.destroy();
        return { kind: "closed", error: next.error };
      }
      if (next.value) return { kind: "frame", frame: next.value };
      if (this.failure) return { kind: "closed", error: this.failure };
      if (this.ended) return { kind: "closed", error: ConnectionError.peerClosed(this.frames.buffered) };

      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForInput(remaining))) return { kind: "timeout" };
    }
  }

  write(frame: Uint8Array): Promise<void> {
    if (!this.open) return Promise.reject(ConnectionError.notConnected());
    return new Promise((resolve, reject) => {
      this.stream.write(frame, (e) => (e ? reject(ConnectionError.fromSocket(e)) : resolve()));
    });
  }

  close(): void {
    this.ended = true;
    if (!this.stream.destroyed) this.stream.end();
  }

  destroy(): void {
    this.ended = true;
    this.stream.destroy();
  }

  private notify(): void {
    this.wake?.();
  }

  private waitForInput(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve(false);
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve(true);
      };
    });
  }
}

export const connectTcp: Connector = (endpoint, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(ConnectionError.aborted());
    const socket = createConnection({ host: endpoint.host, port: endpoint.port });
    const onAbort = () => {
      socket.destroy();
      reject(ConnectionError.aborted());
    };
    const onError = (e: Error) => {
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      reject(ConnectionError.fromSocket(e));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("error", onError);
    socket.once("connect", () => {
      signal?.removeEventListener("abort", onAbort);
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(new StreamConnection(socket));
    });
  });
