import net from "net";
import { log } from "./log";
import type { IpVersion, LookupTarget } from "./types";

export const connectSocket = (
  target: LookupTarget,
  family: IpVersion,
  timeoutMs?: number,
): Promise<net.Socket> => {
  const { host, port } = target;
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({
      host,
      port,
      family,
      autoSelectFamily: false,
    });

    const cleanup = () => {
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      socket.off("connect", onConnect);
      socket.setTimeout(0);
    };
    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(err);
    };
    const onTimeout = () =>
      onError(new Error(`Connection timeout to ${host}:${port}`));
    const onConnect = () => {
      cleanup();
      log.debug("Socket", "Connected", {
        host,
        port,
        family,
        remote: socket.remoteAddress,
      });
      resolve(socket);
    };

    if (timeoutMs !== undefined) {
      socket.setTimeout(timeoutMs);
      socket.once("timeout", onTimeout);
    }
    socket.once("error", onError);
    socket.once("connect", onConnect);
  });
};

/**
 * Single receive: the first chunk the peer sends, cut to maxBytes.
 * An empty buffer means the peer closed without sending anything.
 */
export const readOnce = (
  socket: net.Socket,
  maxBytes: number,
  timeoutMs?: number,
): Promise<Buffer> => {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      socket.off("data", onData);
      socket.off("end", onEnd);
      socket.off("close", onEnd);
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      if (timeoutMs !== undefined) {
        socket.setTimeout(0);
      }
    };
    const onData = (chunk: Buffer) => {
      cleanup();
      socket.pause();
      resolve(chunk.subarray(0, maxBytes));
    };
    const onEnd = () => {
      cleanup();
      resolve(Buffer.alloc(0));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const onTimeout = () => {
      cleanup();
      reject(new Error(`Read timeout after ${timeoutMs}ms`));
    };

    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.on("close", onEnd);
    socket.on("error", onError);
    if (timeoutMs !== undefined) {
      socket.setTimeout(timeoutMs);
      socket.on("timeout", onTimeout);
    }
  });
};

export const writeAll = (socket: net.Socket, payload: Buffer): Promise<void> => {
  return new Promise((resolve, reject) => {
    socket.write(payload, (err) => (err ? reject(err) : resolve()));
  });
};
