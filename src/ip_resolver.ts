import type net from "net";
import { AUTO_ORDER, Lookup } from "./constants";
import { log } from "./log";
import { buildRequest, lastLine } from "./response";
import { connectSocket, readOnce, writeAll } from "./socket_utils";
import type { IpMode, IpVersion, LookupTarget, ResolvedAddress } from "./types";

export interface IpResolverOptions {
  target?: LookupTarget;
  /** Per-step connect/read timeout. Unset leaves the OS defaults. */
  timeoutMs?: number;
}

/**
 * Looks up the public address by asking icanhazip over plain HTTP.
 * Every failure comes back as null; nothing is thrown to the caller.
 */
export class IpResolver {
  private readonly target: LookupTarget;
  private readonly timeoutMs?: number;

  constructor(options: IpResolverOptions = {}) {
    this.target = options.target ?? { host: Lookup.HOST, port: Lookup.PORT };
    this.timeoutMs = options.timeoutMs;
  }

  async resolve(version: IpVersion): Promise<ResolvedAddress | null> {
    let socket: net.Socket;
    try {
      socket = await connectSocket(this.target, version, this.timeoutMs);
    } catch (error) {
      log.debug("Resolver", `IPv${version} connection failed`, error);
      return null;
    }

    const onLateError = (error: Error) =>
      log.debug("Resolver", "Socket error after exchange", error);
    socket.on("error", onLateError);

    try {
      await writeAll(socket, buildRequest(this.target.host));
      const payload = await readOnce(
        socket,
        Lookup.RECV_BUFFER_SIZE,
        this.timeoutMs,
      );
      const address = lastLine(payload);
      if (address === null) {
        log.debug("Resolver", `IPv${version} response had no usable line`, {
          bytes: payload.length,
        });
      } else {
        log.debug("Resolver", `IPv${version} resolved`, { address });
      }
      return address;
    } catch (error) {
      log.debug("Resolver", `IPv${version} exchange failed`, error);
      return null;
    } finally {
      socket.destroy();
    }
  }

  async resolveAuto(): Promise<ResolvedAddress | null> {
    for (const version of AUTO_ORDER) {
      const address = await this.resolve(version);
      if (address !== null) {
        return address;
      }
    }
    return null;
  }

  resolveMode(mode: IpMode): Promise<ResolvedAddress | null> {
    return mode === 0 ? this.resolveAuto() : this.resolve(mode);
  }
}
