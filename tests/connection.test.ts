import { createConnection, createServer, type Server, type Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { encodeFrame, frameMessage } from "../src/codec/frame";
import { ConnectionError, FrameError } from "../src/core/errors";
import { Participant } from "../src/core/participant";
import { makeVotePolicy } from "../src/core/policy";
import type { Message } from "../src/core/types";
import { connectTcp, StreamConnection, type Connection } from "../src/infra/connection";
import { asClientId } from "../src/types/brands";
import { silentLogger } from "./helpers/logger";

/** One-shot server that hands each accepted socket to `onSocket`. */
const serve = async (onSocket: (s: Socket) => void): Promise<{ server: Server; port: number }> => {
  const server = createServer(onSocket);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("no port");
  return { server, port: addr.port };
};

const servers: Server[] = [];
const conns: Connection[] = [];

const open = async (onSocket: (s: Socket) => void): Promise<Connection> => {
  const { server, port } = await serve(onSocket);
  servers.push(server);
  const conn = await connectTcp({ host: "127.0.0.1", port });
  conns.push(conn);
  return conn;
};

afterEach(async () => {
  for (const c of conns.splice(0)) c.destroy();
  await Promise.all(
    servers.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))),
  );
});

const decided: Message = { senderId: "publisher", payload: { type: "decided", decided: { xtId: 1, decision: true } } };

describe("StreamConnection", () => {
  it("reassembles a frame written in pieces", async () => {
    const frame = frameMessage(decided);
    const conn = await open((s) => {
      s.write(frame.subarray(0, 3));
      setTimeout(() => s.write(frame.subarray(3, 9)), 20);
      setTimeout(() => s.write(frame.subarray(9)), 40);
    });

    const res = await conn.readFrame(2000);
    expect(res).toEqual({ kind: "frame", frame: new Uint8Array(frame.subarray(4)) });
  });

  it("times out without losing a partial frame", async () => {
    const frame = frameMessage(decided);
    let peer: Socket | undefined;
    const conn = await open((s) => {
      peer = s;
      s.write(frame.subarray(0, 6));
    });

    expect(await conn.readFrame(100)).toEqual({ kind: "timeout" });
    peer?.write(frame.subarray(6));
    expect(await conn.readFrame(2000)).toEqual({ kind: "frame", frame: new Uint8Array(frame.subarray(4)) });
  });

  it("reports a clean close", async () => {
    const conn = await open((s) => s.end());
    const res = await conn.readFrame(2000);
    expect(res.kind).toBe("closed");
    if (res.kind === "closed") {
      expect(res.error).toBeInstanceOf(ConnectionError);
      expect(res.error.message).toBe("Peer closed the connection");
    }
    expect(conn.open).toBe(false);
  });

  it("breaks the connection on an oversize frame", async () => {
    const { server, port } = await serve((s) => s.write(encodeFrame(new Uint8Array(64))));
    servers.push(server);
    const conn = await new Promise<Connection>((resolve, reject) => {
      const socket = createConnection({ host: "127.0.0.1", port }, () => resolve(new StreamConnection(socket, 32)));
      socket.once("error", reject);
    });
    conns.push(conn);

    const res = await conn.readFrame(2000);
    expect(res.kind).toBe("closed");
    if (res.kind === "closed") {
      expect(res.error).toBeInstanceOf(FrameError);
      expect(res.error.kind).toBe("FrameTooLarge");
    }
    expect(conn.open).toBe(false);
  });

  it("rejects writes once closed", async () => {
    const conn = await open(() => {});
    conn.close();
    await expect(conn.write(encodeFrame(new Uint8Array(0)))).rejects.toMatchObject({ kind: "NotConnected" });
  });

  it("gives up a connect once aborted", async () => {
    const { server, port } = await serve(() => {});
    servers.push(server);
    const stopper = new AbortController();
    const pending = connectTcp({ host: "127.0.0.1", port }, stopper.signal);
    stopper.abort();
    await expect(pending).rejects.toMatchObject({ kind: "NotConnected", message: "Connect aborted" });
    await expect(connectTcp({ host: "127.0.0.1", port }, stopper.signal)).rejects.toMatchObject({
      kind: "NotConnected",
    });
  });

  it("maps a refused connect to Refused", async () => {
    const { server, port } = await serve(() => {});
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await expect(connectTcp({ host: "127.0.0.1", port })).rejects.toMatchObject({ kind: "Refused" });
  });
});

describe("Participant over TCP", () => {
  it("ends cleanly when the peer closes mid-frame", async () => {
    const { server, port } = await serve((s) => {
      const header = Buffer.alloc(4);
      header.writeUInt32BE(50, 0);
      s.end(Buffer.concat([header, Buffer.alloc(10, 0x11)]));
    });
    servers.push(server);

    const p = new Participant({
      clientId: asClientId("sequencer-A"),
      chainId: Uint8Array.of(0x12, 0x34),
      policy: makeVotePolicy("commit"),
      endpoint: { host: "127.0.0.1", port },
      logger: silentLogger,
      readTimeoutMs: 200,
    });

    const outcome = await p.run();
    expect(outcome.kind).toBe("disconnected");
    if (outcome.kind === "disconnected") {
      expect(outcome.error.kind).toBe("PeerClosed");
      expect(outcome.error.message).toBe("Peer closed with 14 bytes of an incomplete frame");
    }
    expect(p.running).toBe(false);
    expect(p.stats.framesDiscarded).toBe(0);
  });
});
